// Application: Server status
// Uptime and user counts shared by HTTP, realtime events and commands

import type { IAccountRepository } from '@/domain/user/repository.js';
import type { SessionRegistry } from '@/application/session/SessionRegistry.js';

export interface ServerStatusSnapshot {
  uptime: string;
  uptime_seconds: number;
  connected_users: number;
  total_users: number;
  status: 'online';
}

export function formatUptime(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;

  const clock = `${hours}h ${minutes}m ${rest}s`;
  return days > 0 ? `${days}d ${clock}` : clock;
}

export class ServerStatus {
  private readonly startedAtMs: number;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly accounts: Pick<IAccountRepository, 'count'>,
    private readonly nowMs: () => number = () => Date.now()
  ) {
    this.startedAtMs = this.nowMs();
  }

  uptimeSeconds(): number {
    return Math.floor((this.nowMs() - this.startedAtMs) / 1000);
  }

  async snapshot(): Promise<ServerStatusSnapshot> {
    const uptimeSeconds = this.uptimeSeconds();

    return {
      uptime: formatUptime(uptimeSeconds),
      uptime_seconds: uptimeSeconds,
      connected_users: this.registry.count(),
      total_users: await this.accounts.count(),
      status: 'online',
    };
  }
}
