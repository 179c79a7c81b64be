import { Router } from 'express';
import { z } from 'zod';
import { LoginUseCase } from '../../../application/auth/login.js';
import { UserService } from '../../../application/account/userService.js';
import { toUserDto } from '../../../application/account/userDto.js';
import { InvalidPasswordError, PasswordNotMatchError } from '../../../application/errors.js';
import { checkPasswordLength } from '../../../domain/auth/password.js';
import { UserRepository } from '../../../domain/auth/user.js';
import { createCredentialRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user (inactive until activated)
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [login, email, password, rePassword]
 *             properties:
 *               login: { type: string, minLength: 1, maxLength: 50 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 4, maxLength: 100 }
 *               rePassword: { type: string }
 *               firstName: { type: string, maxLength: 50 }
 *               lastName: { type: string, maxLength: 50 }
 *               langKey: { type: string, minLength: 2, maxLength: 10 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserDTO' }
 *       400:
 *         description: Validation error, invalid password, password mismatch, login or email already used
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/authenticate:
 *   get:
 *     tags: [Auth]
 *     summary: Login of the authenticated caller, empty when anonymous
 *     security: [{ bearerAuth: [] }, {}]
 *     responses:
 *       200:
 *         description: Login
 *         content:
 *           text/plain:
 *             schema: { type: string }
 *   post:
 *     tags: [Auth]
 *     summary: Login and receive a JWT
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, password]
 *             properties:
 *               username: { type: string }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 id_token: { type: string }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Invalid credentials or user not activated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const LOGIN_PATTERN = /^[a-zA-Z0-9!$&*+=?^_`{|}~.-]+@[a-zA-Z0-9-]+(?:\.[a-zA-Z0-9-]+)*$|^[_.@A-Za-z0-9-]+$/;

const registerBodySchema = z.object({
  login: z.string().min(1).max(50).regex(LOGIN_PATTERN, 'Invalid login'),
  email: z.string().email().min(5).max(254),
  password: z.string().nullish(),
  rePassword: z.string().nullish(),
  firstName: z.string().max(50).nullish(),
  lastName: z.string().max(50).nullish(),
  langKey: z.string().min(2).max(10).nullish(),
});

const loginBodySchema = z.object({
  username: z.string().min(1).max(50),
  password: z.string().min(1).max(100),
});

export interface AuthRoutesDeps {
  userService: UserService;
  userRepo: UserRepository;
  jwtSecret: string;
  tokenTtlSeconds: number;
}

export function createAuthRoutes({ userService, userRepo, jwtSecret, tokenTtlSeconds }: AuthRoutesDeps) {
  const router = Router();
  const loginUseCase = new LoginUseCase(userRepo, jwtSecret, tokenTtlSeconds);

  router.post(
    '/register',
    createCredentialRateLimiter(),
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const { password, rePassword, ...profile } = registerBodySchema.parse(req.body);
      if (typeof password !== 'string' || !checkPasswordLength(password)) {
        throw new InvalidPasswordError();
      }
      if (password !== rePassword) {
        throw new PasswordNotMatchError();
      }
      const user = await userService.registerUser(profile, password);
      res.status(201).json(toUserDto(user));
    })
  );

  router.post(
    '/authenticate',
    createCredentialRateLimiter(),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.setHeader('Authorization', `Bearer ${result.token}`);
      res.status(200).json({ id_token: result.token });
    })
  );

  return router;
}
