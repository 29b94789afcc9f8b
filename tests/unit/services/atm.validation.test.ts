/**
 * Unit tests for ATM Validation
 *
 * Tests the express-validator chains for ATM endpoints.
 */

import { Result, ValidationChain, ValidationError, validationResult } from 'express-validator';
import {
  accountKeyValidation,
  cashOperationValidation,
  registerAccountValidation,
} from '../../../src/services/atm/atm.validation';

type FakeRequest = {
  body: Record<string, unknown>;
};

// Helper to run validation and get errors
const runBodyValidation = async (
  validations: ValidationChain[],
  body: Record<string, unknown>
): Promise<{ req: FakeRequest; result: Result<ValidationError> }> => {
  const req: FakeRequest = { body };

  for (const validation of validations) {
    await validation.run(req);
  }

  return { req, result: validationResult(req) };
};

const messagesFor = (result: Result<ValidationError>, field: string): string[] =>
  result
    .array()
    .filter((e) => e.type === 'field' && e.path === field)
    .map((e) => String(e.msg));

const validRegistration = {
  cardNumber: 12345678,
  pin: 1234,
  ownerName: 'Sam Sepiol',
  initialBalance: 300.3,
};

describe('ATM Validation', () => {
  describe('registerAccountValidation', () => {
    it('should pass with a complete registration', async () => {
      const { result } = await runBodyValidation(registerAccountValidation, validRegistration);
      expect(result.isEmpty()).toBe(true);
    });

    it('should fail when the card number is missing', async () => {
      const { cardNumber: _omitted, ...body } = validRegistration;
      const { result } = await runBodyValidation(registerAccountValidation, body);
      expect(messagesFor(result, 'cardNumber')[0]).toBe('Card number is required');
    });

    it('should fail when the card number is fractional', async () => {
      const { result } = await runBodyValidation(registerAccountValidation, {
        ...validRegistration,
        cardNumber: 1.5,
      });
      expect(messagesFor(result, 'cardNumber')).toEqual(['Card number must be a non-negative integer']);
    });

    it('should fail when the PIN is negative', async () => {
      const { result } = await runBodyValidation(registerAccountValidation, {
        ...validRegistration,
        pin: -1,
      });
      expect(messagesFor(result, 'pin')).toEqual(['PIN must be a non-negative integer']);
    });

    it('should fail when the owner name is blank', async () => {
      const { result } = await runBodyValidation(registerAccountValidation, {
        ...validRegistration,
        ownerName: '   ',
      });
      expect(messagesFor(result, 'ownerName')).toEqual(['Owner name is required']);
    });

    it('should fail when the owner name is not a string', async () => {
      const { result } = await runBodyValidation(registerAccountValidation, {
        ...validRegistration,
        ownerName: 42,
      });
      expect(messagesFor(result, 'ownerName')[0]).toBe('Owner name must be a string');
    });

    it('should allow a negative initial balance', async () => {
      const { result } = await runBodyValidation(registerAccountValidation, {
        ...validRegistration,
        initialBalance: -10,
      });
      expect(messagesFor(result, 'initialBalance')).toEqual([]);
    });

    it('should coerce numeric strings and trim the owner name', async () => {
      const { req, result } = await runBodyValidation(registerAccountValidation, {
        cardNumber: '12345678',
        pin: '0042',
        ownerName: '  Sam Sepiol  ',
        initialBalance: '300.30',
      });

      expect(result.isEmpty()).toBe(true);
      expect(req.body).toEqual({
        cardNumber: 12345678,
        pin: 42,
        ownerName: 'Sam Sepiol',
        initialBalance: 300.3,
      });
    });
  });

  describe('accountKeyValidation', () => {
    it('should pass with card number and PIN', async () => {
      const { result } = await runBodyValidation(accountKeyValidation, { cardNumber: 1, pin: 0 });
      expect(result.isEmpty()).toBe(true);
    });

    it('should fail when the PIN is missing', async () => {
      const { result } = await runBodyValidation(accountKeyValidation, { cardNumber: 1 });
      expect(messagesFor(result, 'pin')[0]).toBe('PIN is required');
    });

    it('should fail when the PIN is not numeric', async () => {
      const { result } = await runBodyValidation(accountKeyValidation, { cardNumber: 1, pin: '12a' });
      expect(messagesFor(result, 'pin')).toEqual(['PIN must be a non-negative integer']);
    });
  });

  describe('cashOperationValidation', () => {
    it('should pass with a two-decimal amount', async () => {
      const { result } = await runBodyValidation(cashOperationValidation, {
        cardNumber: 1,
        pin: 1,
        amount: 99.99,
      });
      expect(result.isEmpty()).toBe(true);
    });

    it('should leave negative amounts to the service', async () => {
      const { result } = await runBodyValidation(cashOperationValidation, {
        cardNumber: 1,
        pin: 1,
        amount: -50,
      });
      expect(messagesFor(result, 'amount')).toEqual([]);
    });

    it('should fail when the amount is missing', async () => {
      const { result } = await runBodyValidation(cashOperationValidation, { cardNumber: 1, pin: 1 });
      expect(messagesFor(result, 'amount')[0]).toBe('Amount is required');
    });

    it('should fail when the amount is a word', async () => {
      const { result } = await runBodyValidation(cashOperationValidation, {
        cardNumber: 1,
        pin: 1,
        amount: 'one hundred',
      });
      expect(messagesFor(result, 'amount')).toEqual(['Amount must be a number']);
    });

    it('should fail when the amount has more than 2 decimal places', async () => {
      const { result } = await runBodyValidation(cashOperationValidation, {
        cardNumber: 1,
        pin: 1,
        amount: 100.123,
      });
      expect(messagesFor(result, 'amount')).toEqual(['Amount can have at most 2 decimal places']);
    });
  });
});
