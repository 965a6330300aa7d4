// API layer: Authentication routes
// Signup, email verification, login and verification-code resend

import { Router, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { RateLimitPresetName } from '@/api/middleware/rateLimiter.js';
import type { AccountLifecycle } from '@/application/auth/AccountLifecycle.js';
import type { LoginGuard } from '@/application/auth/LoginGuard.js';
import type { TokenService } from '@/application/auth/TokenService.js';
import type { CharacterService } from '@/application/character/CharacterService.js';
import { toCharacterView } from '@/domain/character/types.js';
import { toPublicAccount } from '@/domain/user/types.js';
import { RequiredString, parseBody } from './body.js';

// Request schemas (presence only; content rules live in the services)
const SignupSchema = z.object({
  username: RequiredString,
  email: RequiredString,
  password: RequiredString,
});

const VerifyEmailSchema = z.object({
  email: RequiredString,
  code: RequiredString,
});

const LoginSchema = z.object({
  username: RequiredString,
  password: RequiredString,
});

const ResendVerificationSchema = z.object({
  email: RequiredString,
});

export interface AuthRouterDeps {
  lifecycle: AccountLifecycle;
  loginGuard: LoginGuard;
  tokens: TokenService;
  characters: CharacterService;
  limit: (preset: RateLimitPresetName) => RequestHandler;
}

export function createAuthRouter(deps: AuthRouterDeps): Router {
  const router = Router();

  /**
   * POST /signup
   * Register an unverified account and mail its verification code
   */
  router.post(
    '/signup',
    deps.limit('signup'),
    asyncHandler(async (req: Request, res: Response) => {
      const data = parseBody(SignupSchema, req.body);
      const result = await deps.lifecycle.signup(data);

      res.status(201).json({
        message: 'User created successfully. Please check your email for verification code.',
        user_id: result.accountId,
      });
    })
  );

  /**
   * POST /verify-email
   */
  router.post(
    '/verify-email',
    deps.limit('verifyEmail'),
    asyncHandler(async (req: Request, res: Response) => {
      const { email, code } = parseBody(VerifyEmailSchema, req.body);
      const outcome = await deps.lifecycle.verifyEmail(email, code);

      res.json({
        message: outcome.alreadyVerified ? 'Email already verified' : 'Email verified successfully',
      });
    })
  );

  /**
   * POST /login
   * Returns a session token plus the account's active characters
   */
  router.post(
    '/login',
    deps.limit('login'),
    asyncHandler(async (req: Request, res: Response) => {
      const credentials = parseBody(LoginSchema, req.body);
      const account = await deps.loginGuard.login(credentials, { ip: req.ip, channel: 'http' });

      const { token } = deps.tokens.issue(account.id, account.username);
      const characters = await deps.characters.listActive(account.id);

      res.json({
        message: 'Login successful',
        token,
        user: toPublicAccount(account),
        characters: characters.map(toCharacterView),
      });
    })
  );

  /**
   * POST /resend-verification
   */
  router.post(
    '/resend-verification',
    deps.limit('resendVerification'),
    asyncHandler(async (req: Request, res: Response) => {
      const { email } = parseBody(ResendVerificationSchema, req.body);
      const outcome = await deps.lifecycle.resendVerification(email);

      res.json({
        message: outcome.alreadyVerified ? 'Email already verified' : 'Verification code sent',
      });
    })
  );

  return router;
}
