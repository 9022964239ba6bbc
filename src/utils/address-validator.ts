// src/utils/address-validator.ts
import { LAUNCH_CONSTANTS } from '../constants/launch-constants';
import { ValidationError } from '../types/errors';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const LAUNCH_ID_PATTERN = /^0x[0-9a-f]{64}$/;

export class AddressValidator {
  /**
   * Validates a 20-byte hex address (any case, no checksum enforcement)
   */
  static isValidAddress(address: unknown): address is string {
    return typeof address === 'string' && ADDRESS_PATTERN.test(address);
  }

  static isZeroAddress(address: string): boolean {
    return address.toLowerCase() === LAUNCH_CONSTANTS.ZERO_ADDRESS;
  }

  /**
   * Returns the lowercased address, rejecting malformed and zero addresses
   */
  static requireAddress(address: unknown, field: string): string {
    if (!this.isValidAddress(address)) {
      throw new ValidationError(`${field} is not a valid address: ${String(address)}`);
    }
    if (this.isZeroAddress(address)) {
      throw new ValidationError(`${field} must not be the zero address`);
    }
    return address.toLowerCase();
  }

  static isLaunchId(value: unknown): value is string {
    return typeof value === 'string' && LAUNCH_ID_PATTERN.test(value);
  }

  static requireLaunchId(value: unknown): string {
    if (!this.isLaunchId(value)) {
      throw new ValidationError(`Invalid launch id: ${String(value)}`);
    }
    return value;
  }

  static requireChainId(value: unknown, field: string = 'chainId'): number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value <= 0) {
      throw new ValidationError(`${field} must be a positive integer`);
    }
    return value;
  }

  /**
   * Trims a token name or symbol, rejecting empty and over-long values
   */
  static requireText(value: unknown, field: string, maxLength: number): string {
    if (typeof value !== 'string') {
      throw new ValidationError(`${field} is required`);
    }
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      throw new ValidationError(`${field} must not be empty`);
    }
    if (trimmed.length > maxLength) {
      throw new ValidationError(`${field} exceeds ${maxLength} characters`);
    }
    return trimmed;
  }
}
