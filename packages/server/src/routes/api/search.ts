import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { AppContext } from '../../context.js';
import { createResponse } from '../../utils/responses.js';
import { selectProfiles } from '../../utils/profiles.js';

const QuerySchema = z.object({
  query: z.string().trim().min(1),
  profiles: z.string().optional(),
});

export function createSearchRouter(context: AppContext): Router {
  const router: Router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { query, profiles } = QuerySchema.parse(req.query);
      const result = await context.resolver.resolveSearch(
        query,
        selectProfiles(context.profiles, profiles)
      );
      res.status(200).json(
        createResponse({
          success: true,
          data: { superseded: Object.keys(result).length === 0, result },
        })
      );
    } catch (error) {
      next(error);
    }
  });

  return router;
}
