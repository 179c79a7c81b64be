import { describe, it, expect } from 'vitest';
import { translateUniqueViolation } from '../userRepo.js';
import { EmailAlreadyUsedError, LoginAlreadyUsedError } from '../../../application/errors.js';

describe('translateUniqueViolation', () => {
  it('should map the login constraint to LoginAlreadyUsedError', () => {
    const error = translateUniqueViolation({ code: '23505', constraint: 'users_login_key' });

    expect(error).toBeInstanceOf(LoginAlreadyUsedError);
  });

  it('should map the e-mail index to EmailAlreadyUsedError', () => {
    const error = translateUniqueViolation({ code: '23505', constraint: 'users_email_lower_idx' });

    expect(error).toBeInstanceOf(EmailAlreadyUsedError);
  });

  it('should pass other database errors through', () => {
    const foreignKey = { code: '23503', constraint: 'users_login_key' };
    const otherIndex = { code: '23505', constraint: 'schema_migrations_pkey' };
    const plain = new Error('connection terminated');

    expect(translateUniqueViolation(foreignKey)).toBe(foreignKey);
    expect(translateUniqueViolation(otherIndex)).toBe(otherIndex);
    expect(translateUniqueViolation(plain)).toBe(plain);
  });
});
