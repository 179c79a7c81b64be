import { randomInt } from 'crypto';

const KEY_LENGTH = 20;

/**
 * Numeric key used for activation and password reset links.
 */
export function generateKey(length = KEY_LENGTH): string {
  let key = '';
  for (let i = 0; i < length; i++) {
    key += randomInt(0, 10).toString();
  }
  return key;
}

export const generateActivationKey = (): string => generateKey();
export const generateResetKey = (): string => generateKey();
