// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  addLogContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';
