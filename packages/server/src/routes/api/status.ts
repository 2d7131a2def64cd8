import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { Env } from '@resolvarr/core';
import type { AppContext } from '../../context.js';
import { createResponse } from '../../utils/responses.js';

export interface StatusResponse {
  version: string;
  uptime: number;
  profiles: string[];
  ledger: { handles: number; maxEntries: number; ttl: number };
  settings: {
    debridConfigured: boolean;
    searchDebounce: number;
    snapshotTtl: number;
    requestTimeout: number;
  };
}

const statusInfo = (context: AppContext): StatusResponse => ({
  version: Env.VERSION,
  uptime: Math.floor(process.uptime()),
  profiles: context.profiles.map((profile) => profile.name),
  ledger: {
    handles: context.resolver.ledger.size,
    maxEntries: Env.LEDGER_MAX_ENTRIES,
    ttl: Env.LEDGER_TTL,
  },
  settings: {
    debridConfigured: Env.REALDEBRID_API_KEY.length > 0,
    searchDebounce: Env.SEARCH_DEBOUNCE,
    snapshotTtl: Env.SNAPSHOT_TTL,
    requestTimeout: Env.REQUEST_TIMEOUT,
  },
});

export function createStatusRouter(context: AppContext): Router {
  const router: Router = Router();

  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(
        createResponse({
          success: true,
          data: statusInfo(context),
        })
      );
    } catch (error) {
      next(error);
    }
  });

  return router;
}
