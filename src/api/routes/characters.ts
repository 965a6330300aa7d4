// API layer: Character routes
// List and create characters for an account

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { CharacterService } from '@/application/character/CharacterService.js';
import type { IAccountRepository } from '@/domain/user/repository.js';
import { toCharacterView } from '@/domain/character/types.js';
import { NotFoundError, ValidationError } from '@/utils/errors.js';
import { RequiredString, parseBody } from './body.js';

// user_id arrives as a query string or a JSON number
const UserIdSchema = z.union([RequiredString, z.number().int()]).transform(String);

const CreateCharacterSchema = z.object({
  user_id: UserIdSchema,
  name: RequiredString,
  description: z.string().optional(),
});

export interface CharacterRouterDeps {
  accounts: Pick<IAccountRepository, 'findById'>;
  characters: CharacterService;
}

export function createCharacterRouter(deps: CharacterRouterDeps): Router {
  const router = Router();

  async function requireAccountId(userId: string): Promise<string> {
    const account = await deps.accounts.findById(userId);
    if (!account) {
      throw new NotFoundError('User not found');
    }
    return account.id;
  }

  /**
   * GET /characters?user_id=ID
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = UserIdSchema.safeParse(req.query.user_id);
      if (!parsed.success) {
        throw new ValidationError('user_id is required');
      }

      const accountId = await requireAccountId(parsed.data);
      const characters = await deps.characters.listActive(accountId);

      res.json({ characters: characters.map(toCharacterView) });
    })
  );

  /**
   * POST /characters
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const data = parseBody(CreateCharacterSchema, req.body);

      const accountId = await requireAccountId(data.user_id);
      const character = await deps.characters.create(accountId, data.name, data.description);

      res.status(201).json({
        message: 'Character created successfully',
        character: toCharacterView(character),
      });
    })
  );

  return router;
}
