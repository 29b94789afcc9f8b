/**
 * ATM Controller
 *
 * Thin HTTP adapter over AtmService. Bodies reach these handlers already
 * validated and coerced by the chains in atm.validation.ts.
 */

import fs from 'fs';
import path from 'path';
import { Request, Response, NextFunction } from 'express';

import { addLogContext } from '../../observability';
import { AtmService } from './atm.service';

interface AccountKeyBody {
  cardNumber: number;
  pin: number;
}

interface RegisterAccountBody extends AccountKeyBody {
  ownerName: string;
  initialBalance: number;
}

interface CashOperationBody extends AccountKeyBody {
  amount: number;
}

type BodyRequest<T> = Request<Record<string, string>, unknown, T>;

export class AtmController {
  constructor(
    private readonly atmService: AtmService,
    private readonly ledgerDir: string
  ) {}

  /**
   * Register a new account
   * POST /atm/accounts
   */
  registerAccount(req: BodyRequest<RegisterAccountBody>, res: Response, next: NextFunction): void {
    try {
      const { cardNumber, pin, ownerName, initialBalance } = req.body;
      addLogContext({ cardNumber });

      const account = this.atmService.registerAccount(cardNumber, pin, ownerName, initialBalance);

      res.status(201).json({
        success: true,
        data: {
          account: {
            cardNumber: account.cardNumber,
            ownerName: account.ownerName,
            balance: account.balance,
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /atm/balance
   */
  checkBalance(req: BodyRequest<AccountKeyBody>, res: Response, next: NextFunction): void {
    try {
      const { cardNumber, pin } = req.body;
      addLogContext({ cardNumber });

      const balance = this.atmService.checkBalance(cardNumber, pin);

      res.status(200).json({
        success: true,
        data: { cardNumber, balance },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /atm/deposit
   */
  deposit(req: BodyRequest<CashOperationBody>, res: Response, next: NextFunction): void {
    try {
      const { cardNumber, pin, amount } = req.body;
      addLogContext({ cardNumber });

      const result = this.atmService.depositCash(cardNumber, pin, amount);

      res.status(200).json({
        success: true,
        data: {
          message: 'Deposit successful',
          newBalance: result.newBalance,
          record: result.record,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /atm/withdraw
   */
  withdraw(req: BodyRequest<CashOperationBody>, res: Response, next: NextFunction): void {
    try {
      const { cardNumber, pin, amount } = req.body;
      addLogContext({ cardNumber });

      const result = this.atmService.withdrawCash(cardNumber, pin, amount);

      res.status(200).json({
        success: true,
        data: {
          message: 'Withdrawal successful',
          newBalance: result.newBalance,
          record: result.record,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Return the ledger as plain text
   * POST /atm/ledger
   */
  getLedger(req: BodyRequest<AccountKeyBody>, res: Response, next: NextFunction): void {
    try {
      const { cardNumber, pin } = req.body;
      addLogContext({ cardNumber });

      const ledger = this.atmService.renderLedger(cardNumber, pin);

      res.status(200).type('text/plain').send(ledger);
    } catch (error) {
      next(error);
    }
  }

  /**
   * Write the ledger into the configured ledger directory
   * POST /atm/ledger/export
   */
  exportLedger(req: BodyRequest<AccountKeyBody>, res: Response, next: NextFunction): void {
    try {
      const { cardNumber, pin } = req.body;
      addLogContext({ cardNumber });

      fs.mkdirSync(this.ledgerDir, { recursive: true });
      const destination = path.join(this.ledgerDir, `ledger-${cardNumber}.txt`);
      this.atmService.printLedger(destination, cardNumber, pin);

      res.status(201).json({
        success: true,
        data: { path: destination },
      });
    } catch (error) {
      next(error);
    }
  }
}
