export type TransactionType = 'DEPOSIT' | 'WITHDRAWAL';

export const transactionLabels: Record<TransactionType, string> = {
  DEPOSIT: 'Deposit',
  WITHDRAWAL: 'Withdrawal',
};

/**
 * One line of an account's history, already rendered for the ledger.
 * Records are appended in the order the operations happened and never edited.
 */
export type TransactionRecord = string;
