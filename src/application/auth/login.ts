import { Password } from '../../domain/auth/password.js';
import { UserRepository } from '../../domain/auth/user.js';
import { UnauthorizedError, UserNotActivatedError } from '../errors.js';
import jwt from 'jsonwebtoken';

export interface LoginCommand {
  username: string;
  password: string;
}

export interface LoginResult {
  token: string;
  login: string;
  authorities: string[];
}

export interface TokenClaims {
  sub: string;
  auth: string[];
}

const BAD_CREDENTIALS = 'Invalid username or password';

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private jwtSecret: string,
    private tokenTtlSeconds: number
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const login = command.username.toLowerCase();
    const user = await this.userRepo.findOneByLogin(login);
    if (!user) {
      throw new UnauthorizedError(BAD_CREDENTIALS);
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new UnauthorizedError(BAD_CREDENTIALS);
    }

    if (!user.activated) {
      throw new UserNotActivatedError(user.login);
    }

    const claims: TokenClaims = {
      sub: user.login,
      auth: [...user.authorities],
    };
    const token = jwt.sign(claims, this.jwtSecret, {
      algorithm: 'HS256',
      expiresIn: this.tokenTtlSeconds,
    });

    return {
      token,
      login: user.login,
      authorities: claims.auth,
    };
  }
}
