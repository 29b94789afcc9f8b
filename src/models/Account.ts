/**
 * Lookup key for an account: card number plus PIN.
 * Both parts are required to find an account; neither is unique on its own.
 */
export interface AccountKey {
  cardNumber: number;
  pin: number;
}

export interface Account extends AccountKey {
  ownerName: string;
  balance: number;
}

/**
 * Map key for an (card number, PIN) pair. The separator cannot occur in
 * either part, so distinct pairs never collide.
 */
export type CompositeKey = `${number}:${number}`;

export const toCompositeKey = ({ cardNumber, pin }: AccountKey): CompositeKey =>
  `${cardNumber}:${pin}`;
