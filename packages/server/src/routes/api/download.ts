import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { AppContext } from '../../context.js';
import { APIError, createResponse } from '../../utils/responses.js';

const ParamsSchema = z.object({
  handle: z.string().min(1),
  offset: z.coerce.number().int().nonnegative(),
});

/** Routes that act on a previously published ranking. */
export function createDownloadRouter(context: AppContext): Router {
  const router: Router = Router();

  router.get(
    '/select/:handle/:offset',
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const { handle, offset } = ParamsSchema.parse(req.params);
        const candidate = context.resolver.selectForDownload(handle, offset);
        if (!candidate) {
          throw new APIError(
            'NOT_FOUND',
            404,
            `No release at offset ${offset} of ${handle}`
          );
        }
        res.status(200).json(createResponse({ success: true, data: candidate }));
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/download/:handle/:offset',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { handle, offset } = ParamsSchema.parse(req.params);
        const outcome = await context.resolver.download(handle, offset);
        switch (outcome.status) {
          case 'not_found':
            throw new APIError(
              'NOT_FOUND',
              404,
              `No release at offset ${offset} of ${handle}`
            );
          case 'failed':
            throw new APIError(
              'DOWNLOAD_FAILED',
              502,
              `No release from offset ${offset} of ${handle} could be downloaded`
            );
          case 'downloaded':
            res.status(200).json(
              createResponse({
                success: true,
                data: { offset: outcome.offset, candidate: outcome.candidate },
              })
            );
        }
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
