/**
 * ATM Service Module
 *
 * Account registration, cash deposits and withdrawals, and per-account
 * transaction ledgers, held in memory by a single AtmService instance.
 */

// Service
export {
  AtmService,
  AtmServiceOptions,
  OperationResult,
  DepositResult,
  WithdrawalResult,
} from './atm.service';

// Formatting
export { formatAmount, formatTransaction, formatLedger } from './atm.format';

// Controller
export { AtmController } from './atm.controller';

// Routes
export { createAtmRouter } from './atm.routes';
