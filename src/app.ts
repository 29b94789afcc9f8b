import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, notFoundHandler } from './middlewares';
import { createHealthRouter } from './routes/health';
import { AtmController, AtmService, createAtmRouter } from './services/atm';
import { correlationMiddleware } from './observability';

export interface AppOptions {
  /** Service instance to serve; a fresh, empty one by default. */
  atmService?: AtmService;
  /** Directory for exported ledger files. */
  ledgerDir?: string;
}

export const createApp = (options: AppOptions = {}): Application => {
  const app = express();
  const atmService = options.atmService ?? new AtmService();
  const atmController = new AtmController(atmService, options.ledgerDir ?? config.atm.ledgerDir);

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  app.use(correlationMiddleware);

  // Routes
  app.use('/health', createHealthRouter(atmService));
  app.use('/atm', createAtmRouter(atmController));

  app.get('/', (_req, res) => {
    res.json({
      name: 'ATM Ledger API',
      version: '1.0.0',
      description: 'In-memory ATM accounts with per-account transaction ledgers',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
