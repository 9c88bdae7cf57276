import { ValidationError } from '../errors';
import { ONE } from './math';
import { isValidAddress } from './addresses';
import { ProtocolFeeConfig } from '../types/fee';

/**
 * Input validation helpers. Each throws ValidationError naming the field.
 */

export function validateAddress(address: string, field: string): void {
  if (!isValidAddress(address)) {
    throw new ValidationError(`Invalid ${field}: ${address}`, { field, address });
  }
}

export function validatePositiveAmount(amount: bigint, field: string): void {
  if (amount <= 0n) {
    throw new ValidationError(`${field} must be positive`, {
      field,
      amount: amount.toString(),
    });
  }
}

export function validateNonNegativeAmount(amount: bigint, field: string): void {
  if (amount < 0n) {
    throw new ValidationError(`${field} must be non-negative`, {
      field,
      amount: amount.toString(),
    });
  }
}

/**
 * Percentages in [0, ONE]; treasuries valid strkeys.
 */
export function validateFeeConfig(config: ProtocolFeeConfig): void {
  for (const field of ['protocolFeePercentage', 'gyroPortion'] as const) {
    const value = config[field];
    if (value < 0n || value > ONE) {
      throw new ValidationError(`${field} must be between 0 and 1e18`, {
        field,
        value: value.toString(),
      });
    }
  }
  validateAddress(config.gyroTreasury, 'gyroTreasury');
  validateAddress(config.protocolTreasury, 'protocolTreasury');
}
