import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { MEDIA_KINDS, createMediaTarget } from '@resolvarr/core';
import type { AppContext } from '../../context.js';
import { createResponse } from '../../utils/responses.js';
import { selectProfiles } from '../../utils/profiles.js';

const ParamsSchema = z.object({
  kind: z.enum(MEDIA_KINDS),
  externalId: z.string().min(1),
});

const QuerySchema = z.object({
  seasons: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((season) => season.trim())
        .filter((season) => season.length > 0)
        .map(Number)
    ),
  episode: z.coerce.number().int().nonnegative().optional(),
  profiles: z.string().optional(),
});

export function createResolveRouter(context: AppContext): Router {
  const router: Router = Router();

  router.get(
    '/:kind/:externalId',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { kind, externalId } = ParamsSchema.parse(req.params);
        const query = QuerySchema.parse(req.query);
        const target = createMediaTarget({
          kind,
          externalId,
          seasons: query.seasons,
          episode: query.episode,
        });
        const profiles = selectProfiles(context.profiles, query.profiles);
        const result = await context.resolver.resolve(target, profiles);
        res.status(200).json(createResponse({ success: true, data: result }));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
