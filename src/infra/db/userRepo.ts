import type { Pool, QueryResult } from 'pg';
import { NewUser, User, UserRepository } from '../../domain/auth/user.js';
import { EmailAlreadyUsedError, LoginAlreadyUsedError } from '../../application/errors.js';

interface UserRow {
  id: string;
  login: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  lang_key: string;
  image_url: string | null;
  address: string | null;
  phone_number: string | null;
  identity_card_number: string | null;
  activated: boolean;
  activation_key: string | null;
  reset_key: string | null;
  reset_date: Date | null;
  authorities: string[];
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = `id, login, email, password_hash, first_name, last_name, lang_key,
  image_url, address, phone_number, identity_card_number, activated,
  activation_key, reset_key, reset_date, authorities, created_at, updated_at`;

const UNIQUE_VIOLATION = '23505';
const LOGIN_CONSTRAINT = 'users_login_key';
const EMAIL_CONSTRAINT = 'users_email_lower_idx';

/**
 * Turn a unique violation on login or e-mail into the matching application error.
 * Two registrations can both pass the duplicate checks; the index rejects the later one.
 */
export function translateUniqueViolation(error: unknown): unknown {
  if (
    error &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION &&
    'constraint' in error
  ) {
    if (error.constraint === LOGIN_CONSTRAINT) {
      return new LoginAlreadyUsedError();
    }
    if (error.constraint === EMAIL_CONSTRAINT) {
      return new EmailAlreadyUsedError();
    }
  }
  return error;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    login: row.login,
    email: row.email,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    langKey: row.lang_key,
    imageUrl: row.image_url,
    address: row.address,
    phoneNumber: row.phone_number,
    identityCardNumber: row.identity_card_number,
    activated: row.activated,
    activationKey: row.activation_key,
    resetKey: row.reset_key,
    resetDate: row.reset_date,
    authorities: row.authorities,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgUserRepo implements UserRepository {
  constructor(private readonly db: Pool) {}

  async findOneByLogin(login: string): Promise<User | null> {
    return this.findOne('login = $1', login);
  }

  async findOneByEmailIgnoreCase(email: string): Promise<User | null> {
    return this.findOne('LOWER(email) = LOWER($1)', email);
  }

  async findOneByActivationKey(activationKey: string): Promise<User | null> {
    return this.findOne('activation_key = $1', activationKey);
  }

  async findOneByResetKey(resetKey: string): Promise<User | null> {
    return this.findOne('reset_key = $1', resetKey);
  }

  async create(user: NewUser): Promise<User> {
    const result = await this.write(
      `INSERT INTO users (login, email, password_hash, first_name, last_name, lang_key,
         image_url, address, phone_number, identity_card_number, activated,
         activation_key, reset_key, reset_date, authorities)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
       RETURNING ${USER_COLUMNS}`,
      [
        user.login,
        user.email,
        user.passwordHash,
        user.firstName,
        user.lastName,
        user.langKey,
        user.imageUrl,
        user.address,
        user.phoneNumber,
        user.identityCardNumber,
        user.activated,
        user.activationKey,
        user.resetKey,
        user.resetDate,
        [...user.authorities],
      ]
    );

    return toUser(result.rows[0]);
  }

  async save(user: User): Promise<User> {
    const result = await this.write(
      `UPDATE users
       SET email = $2, password_hash = $3, first_name = $4, last_name = $5, lang_key = $6,
           image_url = $7, address = $8, phone_number = $9, identity_card_number = $10,
           activated = $11, activation_key = $12, reset_key = $13, reset_date = $14,
           authorities = $15, updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [
        user.id,
        user.email,
        user.passwordHash,
        user.firstName,
        user.lastName,
        user.langKey,
        user.imageUrl,
        user.address,
        user.phoneNumber,
        user.identityCardNumber,
        user.activated,
        user.activationKey,
        user.resetKey,
        user.resetDate,
        [...user.authorities],
      ]
    );

    if (result.rows.length === 0) {
      throw new Error(`User ${user.id} not found`);
    }
    return toUser(result.rows[0]);
  }

  private async write(text: string, values: unknown[]): Promise<QueryResult<UserRow>> {
    try {
      return await this.db.query<UserRow>(text, values);
    } catch (error) {
      throw translateUniqueViolation(error);
    }
  }

  private async findOne(predicate: string, value: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${predicate}`,
      [value]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }
}
