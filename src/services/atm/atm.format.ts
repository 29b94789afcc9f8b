import { Account, TransactionRecord, TransactionType, transactionLabels } from '../../models';

/**
 * Render an amount the way ledger lines show it: `$` and two decimals.
 */
export const formatAmount = (amount: number): string => `$${amount.toFixed(2)}`;

export const formatTransaction = (
  type: TransactionType,
  amount: number,
  updatedBalance: number
): TransactionRecord =>
  `${transactionLabels[type]} - Amount: ${formatAmount(amount)}, Updated Balance: ${formatAmount(updatedBalance)}`;

/**
 * Header lines followed by every record, oldest first, newline-terminated.
 */
export const formatLedger = (
  account: Pick<Account, 'ownerName' | 'cardNumber' | 'pin'>,
  records: readonly TransactionRecord[]
): string => {
  const lines = [
    `Name: ${account.ownerName}`,
    `Card Number: ${account.cardNumber}`,
    `PIN: ${account.pin}`,
    ...records,
  ];
  return `${lines.join('\n')}\n`;
};
