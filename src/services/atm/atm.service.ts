import fs from 'fs';
import type { Logger } from 'pino';

import {
  Account,
  AccountKey,
  CompositeKey,
  TransactionRecord,
  TransactionType,
  toCompositeKey,
} from '../../models';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability';
import { formatLedger, formatTransaction } from './atm.format';

export interface OperationResult {
  type: TransactionType;
  newBalance: number;
  record: TransactionRecord;
}

export interface DepositResult extends OperationResult {
  type: 'DEPOSIT';
}

export interface WithdrawalResult extends OperationResult {
  type: 'WITHDRAWAL';
}

export interface AtmServiceOptions {
  logger?: Pick<Logger, 'info' | 'debug'>;
}

/**
 * In-memory account and transaction store for a single ATM.
 *
 * Every operation is synchronous and validates fully before it mutates
 * anything, so a thrown ApiError always leaves both stores untouched.
 */
export class AtmService {
  private readonly accounts = new Map<CompositeKey, Account>();
  private readonly transactions = new Map<CompositeKey, TransactionRecord[]>();
  private readonly log: Pick<Logger, 'info' | 'debug'>;

  constructor(options: AtmServiceOptions = {}) {
    this.log = options.logger ?? createServiceLogger('atm');
  }

  /**
   * Open an account under (cardNumber, pin) with an empty history.
   * The initial balance is taken as given, sign included.
   */
  registerAccount(cardNumber: number, pin: number, ownerName: string, initialBalance: number): Account {
    const key = this.keyOf(cardNumber, pin);

    if (!Number.isFinite(initialBalance)) {
      throw ApiError.invalidAmount('Initial balance must be a finite number');
    }
    if (this.accounts.has(key)) {
      throw ApiError.accountExists();
    }

    const account: Account = { cardNumber, pin, ownerName, balance: initialBalance };
    this.accounts.set(key, account);
    this.transactions.set(key, []);

    this.log.info({ cardNumber }, 'Account registered');
    return { ...account };
  }

  checkBalance(cardNumber: number, pin: number): number {
    return this.getAccount(cardNumber, pin).balance;
  }

  depositCash(cardNumber: number, pin: number, amount: number): DepositResult {
    const account = this.getAccount(cardNumber, pin);
    this.assertAmount(amount);

    account.balance += amount;
    const record = this.append(account, 'DEPOSIT', amount);

    this.log.info({ cardNumber, amount, newBalance: account.balance }, 'Cash deposited');
    return { type: 'DEPOSIT', newBalance: account.balance, record };
  }

  withdrawCash(cardNumber: number, pin: number, amount: number): WithdrawalResult {
    const account = this.getAccount(cardNumber, pin);
    this.assertAmount(amount);

    if (amount > account.balance) {
      throw ApiError.insufficientFunds();
    }

    account.balance -= amount;
    const record = this.append(account, 'WITHDRAWAL', amount);

    this.log.info({ cardNumber, amount, newBalance: account.balance }, 'Cash withdrawn');
    return { type: 'WITHDRAWAL', newBalance: account.balance, record };
  }

  /**
   * Ledger text for one account: owner, card number and PIN, then every
   * transaction in the order it was recorded.
   */
  renderLedger(cardNumber: number, pin: number): string {
    const account = this.getAccount(cardNumber, pin);
    return formatLedger(account, this.recordsOf(account));
  }

  /**
   * Write the ledger to `destination`, replacing any existing file.
   * The account is looked up before the file is touched.
   */
  printLedger(destination: string, cardNumber: number, pin: number): void {
    const text = this.renderLedger(cardNumber, pin);

    try {
      fs.writeFileSync(destination, text, 'utf-8');
    } catch (error) {
      throw ApiError.ledgerWrite(destination, error);
    }

    this.log.debug({ cardNumber, destination }, 'Ledger written');
  }

  getTransactionHistory(cardNumber: number, pin: number): TransactionRecord[] {
    const account = this.getAccount(cardNumber, pin);
    return [...this.recordsOf(account)];
  }

  getAccounts(): ReadonlyMap<CompositeKey, Readonly<Account>> {
    return this.accounts;
  }

  getTransactions(): ReadonlyMap<CompositeKey, readonly TransactionRecord[]> {
    return this.transactions;
  }

  private keyOf(cardNumber: number, pin: number): CompositeKey {
    const key: AccountKey = { cardNumber, pin };
    const parts: Array<[keyof AccountKey, number]> = [
      ['cardNumber', cardNumber],
      ['pin', pin],
    ];
    for (const [field, value] of parts) {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw ApiError.invalidInput(`${field} must be a non-negative integer`);
      }
    }
    return toCompositeKey(key);
  }

  private getAccount(cardNumber: number, pin: number): Account {
    const account = this.accounts.get(this.keyOf(cardNumber, pin));
    if (!account) {
      throw ApiError.accountNotFound();
    }
    return account;
  }

  private assertAmount(amount: number): void {
    if (!Number.isFinite(amount)) {
      throw ApiError.invalidAmount('Amount must be a finite number');
    }
    if (amount < 0) {
      throw ApiError.invalidAmount();
    }
  }

  private recordsOf(account: Account): readonly TransactionRecord[] {
    return this.transactions.get(toCompositeKey(account)) ?? [];
  }

  private append(account: Account, type: TransactionType, amount: number): TransactionRecord {
    const record = formatTransaction(type, amount, account.balance);
    const key = toCompositeKey(account);
    const history = this.transactions.get(key) ?? [];
    history.push(record);
    this.transactions.set(key, history);
    return record;
  }
}
