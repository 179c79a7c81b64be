export const Authority = {
  USER: 'ROLE_USER',
  ADMIN: 'ROLE_ADMIN',
} as const;

export type Authority = (typeof Authority)[keyof typeof Authority];

export const DEFAULT_LANG_KEY = 'en';

/**
 * User domain entity.
 * Login and email are stored lowercased.
 */
export interface User {
  readonly id: string;
  readonly login: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly firstName: string | null;
  readonly lastName: string | null;
  readonly langKey: string;
  readonly imageUrl: string | null;
  readonly address: string | null;
  readonly phoneNumber: string | null;
  readonly identityCardNumber: string | null;
  readonly activated: boolean;
  readonly activationKey: string | null;
  readonly resetKey: string | null;
  readonly resetDate: Date | null;
  readonly authorities: readonly string[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Fields supplied when a user row is first inserted.
 * id and timestamps are assigned by the store.
 */
export type NewUser = Omit<User, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Profile fields the owner of an account may change.
 */
export interface ProfileUpdate {
  firstName: string | null;
  lastName: string | null;
  email: string;
  langKey: string | null;
  imageUrl: string | null;
  address: string | null;
  phoneNumber: string | null;
  identityCardNumber: string | null;
}

/**
 * Persistence port for users.
 */
export interface UserRepository {
  findOneByLogin(login: string): Promise<User | null>;
  findOneByEmailIgnoreCase(email: string): Promise<User | null>;
  findOneByActivationKey(activationKey: string): Promise<User | null>;
  findOneByResetKey(resetKey: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
  save(user: User): Promise<User>;
}
