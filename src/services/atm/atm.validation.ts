/**
 * ATM API Validation Rules
 *
 * Amounts are checked for shape only. Whether a negative amount is acceptable
 * is decided by AtmService, so the HTTP and in-process paths fail the same way.
 */

import { body } from 'express-validator';

const keyValidation = [
  body('cardNumber')
    .notEmpty()
    .withMessage('Card number is required')
    .isInt({ min: 0, max: Number.MAX_SAFE_INTEGER })
    .withMessage('Card number must be a non-negative integer')
    .toInt(),
  body('pin')
    .notEmpty()
    .withMessage('PIN is required')
    .isInt({ min: 0, max: Number.MAX_SAFE_INTEGER })
    .withMessage('PIN must be a non-negative integer')
    .toInt(),
];

const amountField = (field: string, label: string) =>
  body(field)
    .notEmpty()
    .withMessage(`${label} is required`)
    .isFloat()
    .withMessage(`${label} must be a number`)
    .custom((value) => {
      const decimalPlaces = (String(value).split('.')[1] || '').length;
      if (decimalPlaces > 2) {
        throw new Error(`${label} can have at most 2 decimal places`);
      }
      return true;
    })
    .toFloat();

export const registerAccountValidation = [
  ...keyValidation,
  body('ownerName')
    .isString()
    .withMessage('Owner name must be a string')
    .trim()
    .notEmpty()
    .withMessage('Owner name is required')
    .isLength({ max: 100 })
    .withMessage('Owner name must be at most 100 characters'),
  amountField('initialBalance', 'Initial balance'),
];

export const accountKeyValidation = keyValidation;

export const cashOperationValidation = [...keyValidation, amountField('amount', 'Amount')];
