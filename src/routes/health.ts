import { Router, Request, Response } from 'express';
import { AtmService } from '../services/atm';

/**
 * Health routes. The store is in memory, so the app is healthy whenever it
 * can answer; the account count is reported for a quick sanity check.
 */
export const createHealthRouter = (atmService: AtmService): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      services: {
        atm: {
          accounts: atmService.getAccounts().size,
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
