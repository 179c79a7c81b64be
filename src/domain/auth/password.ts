import { hash, verify } from 'argon2';

export const PASSWORD_MIN_LENGTH = 4;
export const PASSWORD_MAX_LENGTH = 100;

/**
 * Length rule applied to every new password before it reaches the service layer.
 */
export function checkPasswordLength(password: string | null | undefined): boolean {
  return (
    typeof password === 'string' &&
    password.length > 0 &&
    password.length >= PASSWORD_MIN_LENGTH &&
    password.length <= PASSWORD_MAX_LENGTH
  );
}

/**
 * Password hashing using Argon2.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a hash. A malformed hash never verifies.
   */
  static async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
