export { Account, AccountKey, CompositeKey, toCompositeKey } from './Account';
export { TransactionType, TransactionRecord, transactionLabels } from './Transaction';
