import { Password } from '../../domain/auth/password.js';
import { generateActivationKey, generateResetKey } from '../../domain/auth/randomKey.js';
import {
  Authority,
  DEFAULT_LANG_KEY,
  ProfileUpdate,
  User,
  UserRepository,
} from '../../domain/auth/user.js';
import {
  EmailAlreadyUsedError,
  InternalServerError,
  InvalidPasswordError,
  LoginAlreadyUsedError,
} from '../errors.js';
import { logger } from '../../logger.js';

export interface RegisterUserInput {
  login: string;
  email: string;
  firstName?: string | null;
  lastName?: string | null;
  langKey?: string | null;
  imageUrl?: string | null;
}

export interface UserServiceOptions {
  /** How long a reset key stays valid after it was issued. */
  resetKeyTtlMs?: number;
  now?: () => Date;
}

const DEFAULT_RESET_KEY_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Account lifecycle: registration, activation, profile and password management.
 */
export class UserService {
  private readonly log = logger.child({ component: 'UserService' });
  private readonly resetKeyTtlMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly userRepo: UserRepository,
    options: UserServiceOptions = {}
  ) {
    this.resetKeyTtlMs = options.resetKeyTtlMs ?? DEFAULT_RESET_KEY_TTL_MS;
    this.now = options.now ?? (() => new Date());
  }

  async registerUser(input: RegisterUserInput, password: string): Promise<User> {
    const login = input.login.toLowerCase();
    const email = input.email.toLowerCase();

    if (await this.userRepo.findOneByLogin(login)) {
      throw new LoginAlreadyUsedError();
    }
    if (await this.userRepo.findOneByEmailIgnoreCase(email)) {
      throw new EmailAlreadyUsedError();
    }

    const passwordHash = await Password.hash(password);
    const user = await this.userRepo.create({
      login,
      email,
      passwordHash,
      firstName: input.firstName ?? null,
      lastName: input.lastName ?? null,
      langKey: input.langKey ?? DEFAULT_LANG_KEY,
      imageUrl: input.imageUrl ?? null,
      address: null,
      phoneNumber: null,
      identityCardNumber: null,
      activated: false,
      activationKey: generateActivationKey(),
      resetKey: null,
      resetDate: null,
      authorities: [Authority.USER],
    });

    this.log.debug({ login: user.login }, 'Created information for user');
    return user;
  }

  async activateRegistration(key: string): Promise<User | null> {
    this.log.debug('Activating user for activation key');
    const user = await this.userRepo.findOneByActivationKey(key);
    if (!user) {
      return null;
    }

    const activated = await this.userRepo.save({
      ...user,
      activated: true,
      activationKey: null,
    });
    this.log.debug({ login: activated.login }, 'Activated user');
    return activated;
  }

  async getUserWithAuthorities(login: string): Promise<User | null> {
    return await this.userRepo.findOneByLogin(login);
  }

  /**
   * Overwrite the profile of the given user. Returns null when the login is unknown.
   */
  async updateUser(login: string, update: ProfileUpdate): Promise<User | null> {
    const user = await this.userRepo.findOneByLogin(login);
    if (!user) {
      return null;
    }

    const email = update.email.toLowerCase();
    const owner = await this.userRepo.findOneByEmailIgnoreCase(email);
    if (owner && owner.login !== user.login) {
      throw new EmailAlreadyUsedError();
    }

    const saved = await this.userRepo.save({
      ...user,
      firstName: update.firstName,
      lastName: update.lastName,
      email,
      langKey: update.langKey ?? user.langKey,
      imageUrl: update.imageUrl,
      address: update.address,
      phoneNumber: update.phoneNumber,
      identityCardNumber: update.identityCardNumber,
    });
    this.log.debug({ login: saved.login }, 'Changed information for user');
    return saved;
  }

  async changePassword(
    login: string,
    currentPassword: string,
    newPassword: string
  ): Promise<void> {
    const user = await this.userRepo.findOneByLogin(login);
    if (!user) {
      throw new InternalServerError('User could not be found');
    }

    const matches = await Password.verify(currentPassword, user.passwordHash);
    if (!matches) {
      throw new InvalidPasswordError();
    }

    const passwordHash = await Password.hash(newPassword);
    await this.userRepo.save({ ...user, passwordHash });
    this.log.debug({ login: user.login }, 'Changed password for user');
  }

  async requestPasswordReset(mail: string): Promise<User | null> {
    const user = await this.userRepo.findOneByEmailIgnoreCase(mail);
    if (!user || !user.activated) {
      return null;
    }

    return await this.userRepo.save({
      ...user,
      resetKey: generateResetKey(),
      resetDate: this.now(),
    });
  }

  async completePasswordReset(newPassword: string, key: string): Promise<User | null> {
    this.log.debug('Reset user password for reset key');
    const user = await this.userRepo.findOneByResetKey(key);
    if (!user || !user.resetDate) {
      return null;
    }

    const expiresAt = user.resetDate.getTime() + this.resetKeyTtlMs;
    if (expiresAt <= this.now().getTime()) {
      return null;
    }

    const passwordHash = await Password.hash(newPassword);
    return await this.userRepo.save({
      ...user,
      passwordHash,
      resetKey: null,
      resetDate: null,
    });
  }
}
