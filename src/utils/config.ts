// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  allowedOrigins: string[];
}

export interface AuthConfig {
  secretKey?: string;            // Generated per process when absent
  bcryptRounds: number;
  maxLoginAttempts: number;
  lockoutMinutes: number;
  verificationCodeTtlHours: number;
  tokenTtlHours: number;
}

export interface MailConfig {
  smtpServer: string;
  smtpPort: number;
  smtpUsername: string;
  smtpPassword: string;
  fromEmail: string;
}

export interface AppConfig {
  server: ServerConfig;
  auth: AuthConfig;
  mail: MailConfig;
  databasePath: string;
  rateLimitEnabled: boolean;
}

const DEFAULT_ORIGINS = 'http://localhost:3000,http://localhost:5000';

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '5000', 10),
    host: env.HOST || '0.0.0.0',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    allowedOrigins: parseList(env.ALLOWED_ORIGINS || DEFAULT_ORIGINS),
  };
}

export function buildAuthConfig(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  return {
    secretKey: env.SECRET_KEY || undefined,
    bcryptRounds: parseInt(env.BCRYPT_ROUNDS || '10', 10),
    maxLoginAttempts: parseInt(env.MAX_LOGIN_ATTEMPTS || '5', 10),
    lockoutMinutes: parseInt(env.LOCKOUT_MINUTES || '15', 10),
    verificationCodeTtlHours: parseInt(env.VERIFICATION_CODE_TTL_HOURS || '24', 10),
    tokenTtlHours: parseInt(env.TOKEN_TTL_HOURS || '24', 10),
  };
}

export function buildMailConfig(env: NodeJS.ProcessEnv = process.env): MailConfig {
  const smtpUsername = env.SMTP_USERNAME || '';

  return {
    smtpServer: env.SMTP_SERVER || 'smtp.gmail.com',
    smtpPort: parseInt(env.SMTP_PORT || '587', 10),
    smtpUsername,
    smtpPassword: env.SMTP_PASSWORD || '',
    fromEmail: env.FROM_EMAIL || smtpUsername,
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    auth: buildAuthConfig(env),
    mail: buildMailConfig(env),
    databasePath: env.DB_PATH || './data/auth.json',
    rateLimitEnabled: (env.RATE_LIMIT_ENABLED || 'true').toLowerCase() !== 'false',
  };
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (config.auth.secretKey !== undefined && config.auth.secretKey.length < 32) {
    errors.push('SECRET_KEY must be at least 32 characters when set');
  }

  if (!Number.isInteger(config.auth.bcryptRounds) || config.auth.bcryptRounds < 4 || config.auth.bcryptRounds > 15) {
    errors.push('BCRYPT_ROUNDS must be between 4 and 15');
  }

  if (!Number.isInteger(config.auth.maxLoginAttempts) || config.auth.maxLoginAttempts < 1) {
    errors.push('MAX_LOGIN_ATTEMPTS must be a positive integer');
  }

  if (!Number.isInteger(config.auth.lockoutMinutes) || config.auth.lockoutMinutes < 1) {
    errors.push('LOCKOUT_MINUTES must be a positive integer');
  }

  if (!Number.isInteger(config.auth.verificationCodeTtlHours) || config.auth.verificationCodeTtlHours < 1) {
    errors.push('VERIFICATION_CODE_TTL_HOURS must be a positive integer');
  }

  if (!Number.isInteger(config.auth.tokenTtlHours) || config.auth.tokenTtlHours < 1) {
    errors.push('TOKEN_TTL_HOURS must be a positive integer');
  }

  if (!Number.isInteger(config.mail.smtpPort) || config.mail.smtpPort < 1 || config.mail.smtpPort > 65535) {
    errors.push('Invalid SMTP port number');
  }

  return errors;
}
