/**
 * ATM API Routes
 *
 * Every route takes the card number and PIN in the JSON body so the PIN
 * never appears in a URL or access log.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { AtmController } from './atm.controller';
import {
  accountKeyValidation,
  cashOperationValidation,
  registerAccountValidation,
} from './atm.validation';
import { validateRequest } from '../../middlewares/validateRequest';

export const createAtmRouter = (atmController: AtmController): Router => {
  const router = Router();

  // POST /atm/accounts - Register an account
  router.post('/accounts', registerAccountValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    atmController.registerAccount(req, res, next)
  );

  // POST /atm/balance - Current balance
  router.post('/balance', accountKeyValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    atmController.checkBalance(req, res, next)
  );

  // POST /atm/deposit - Deposit cash
  router.post('/deposit', cashOperationValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    atmController.deposit(req, res, next)
  );

  // POST /atm/withdraw - Withdraw cash
  router.post('/withdraw', cashOperationValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    atmController.withdraw(req, res, next)
  );

  // POST /atm/ledger - Ledger as text/plain
  router.post('/ledger', accountKeyValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    atmController.getLedger(req, res, next)
  );

  // POST /atm/ledger/export - Write ledger file
  router.post('/ledger/export', accountKeyValidation, validateRequest, (req: Request, res: Response, next: NextFunction) =>
    atmController.exportLedger(req, res, next)
  );

  return router;
};
