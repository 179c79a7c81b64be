import express, { Router } from 'express';
import { z } from 'zod';
import { UserService } from '../../../application/account/userService.js';
import { toUserDto } from '../../../application/account/userDto.js';
import { InternalServerError, InvalidPasswordError } from '../../../application/errors.js';
import { checkPasswordLength } from '../../../domain/auth/password.js';
import { UserRepository } from '../../../domain/auth/user.js';
import {
  authMiddleware,
  optionalAuthMiddleware,
  getCurrentUserLogin,
} from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { createCredentialRateLimiter } from '../middleware/rateLimit.js';
import { logger } from '../../../logger.js';

/**
 * @openapi
 * /api/activate:
 *   get:
 *     tags: [Account]
 *     summary: Activate a registered user
 *     parameters:
 *       - in: query
 *         name: key
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200: { description: Activated }
 *       400:
 *         description: Missing key
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       500:
 *         description: No user was found for this activation key
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/account:
 *   get:
 *     tags: [Account]
 *     summary: Get the current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Current user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserDTO' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       500:
 *         description: User could not be found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Account]
 *     summary: Update the current user information
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               firstName: { type: string, maxLength: 50 }
 *               lastName: { type: string, maxLength: 50 }
 *               email: { type: string, format: email }
 *               langKey: { type: string, minLength: 2, maxLength: 10 }
 *               imageUrl: { type: string, maxLength: 256 }
 *               address: { type: string, maxLength: 255 }
 *               phoneNumber: { type: string, maxLength: 20 }
 *               identityCardNumber: { type: string, maxLength: 20 }
 *     responses:
 *       200: { description: Saved }
 *       400:
 *         description: Validation error or email already used
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       500:
 *         description: Current user login or record not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/account/change-password:
 *   post:
 *     tags: [Account]
 *     summary: Change the current user's password
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [currentPassword, newPassword]
 *             properties:
 *               currentPassword: { type: string }
 *               newPassword: { type: string, minLength: 4, maxLength: 100 }
 *     responses:
 *       200: { description: Changed }
 *       400:
 *         description: New password length invalid or current password incorrect
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/account/reset-password/init:
 *   post:
 *     tags: [Account]
 *     summary: Request a password reset for an e-mail address
 *     requestBody:
 *       required: true
 *       content:
 *         text/plain:
 *           schema: { type: string, format: email }
 *     responses:
 *       200: { description: Accepted }
 *
 * /api/account/reset-password/finish:
 *   post:
 *     tags: [Account]
 *     summary: Finish a password reset with the reset key
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [key, newPassword]
 *             properties:
 *               key: { type: string }
 *               newPassword: { type: string, minLength: 4, maxLength: 100 }
 *     responses:
 *       200: { description: Password reset }
 *       400:
 *         description: New password length invalid
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       500:
 *         description: No user was found for this reset key
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const activateQuerySchema = z.object({
  key: z.string().min(1),
});

const optionalText = (max: number) => z.string().max(max).nullish().transform((v) => v ?? null);

const userDtoBodySchema = z.object({
  firstName: optionalText(50),
  lastName: optionalText(50),
  email: z.string().email().min(5).max(254),
  langKey: z.string().min(2).max(10).nullish().transform((v) => v ?? null),
  imageUrl: optionalText(256),
  address: optionalText(255),
  phoneNumber: optionalText(20),
  identityCardNumber: optionalText(20),
});

const passwordChangeBodySchema = z.object({
  currentPassword: z.string().default(''),
  newPassword: z.string().nullish(),
});

const keyAndPasswordBodySchema = z.object({
  key: z.string().default(''),
  newPassword: z.string().nullish(),
});

/**
 * The reset request carries the e-mail as plain text, or as a JSON string.
 */
function readMail(body: unknown): string {
  if (typeof body !== 'string') {
    return '';
  }
  const text = body.trim();
  if (!text.startsWith('"')) {
    return text;
  }
  try {
    const decoded: unknown = JSON.parse(text);
    return typeof decoded === 'string' ? decoded.trim() : text;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return text;
    }
    throw error;
  }
}

export interface AccountRoutesDeps {
  userService: UserService;
  userRepo: UserRepository;
  jwtSecret: string;
}

export function createAccountRoutes({ userService, userRepo, jwtSecret }: AccountRoutesDeps) {
  const router = Router();
  const requireAuth = authMiddleware(jwtSecret);
  const log = logger.child({ component: 'AccountRoutes' });

  router.get(
    '/activate',
    validate({ query: activateQuerySchema }),
    asyncHandler(async (req, res) => {
      const { key } = activateQuerySchema.parse(req.query);
      const user = await userService.activateRegistration(key);
      if (!user) {
        throw new InternalServerError('No user was found for this activation key');
      }
      res.status(200).end();
    })
  );

  router.get('/authenticate', optionalAuthMiddleware(jwtSecret), (req, res) => {
    res.status(200).type('text/plain').send(getCurrentUserLogin(req) ?? '');
  });

  router.get(
    '/account',
    requireAuth,
    asyncHandler(async (req, res) => {
      const login = getCurrentUserLogin(req);
      const user = login ? await userService.getUserWithAuthorities(login) : null;
      if (!user) {
        throw new InternalServerError('User could not be found');
      }
      res.status(200).json(toUserDto(user));
    })
  );

  router.post(
    '/account',
    requireAuth,
    validate({ body: userDtoBodySchema }),
    asyncHandler(async (req, res) => {
      const userLogin = getCurrentUserLogin(req);
      if (!userLogin) {
        throw new InternalServerError('Current user login not found');
      }
      const user = await userRepo.findOneByLogin(userLogin);
      if (!user) {
        throw new InternalServerError('User could not be found');
      }

      const body = userDtoBodySchema.parse(req.body);
      await userService.updateUser(userLogin, body);
      res.status(200).end();
    })
  );

  router.post(
    '/account/change-password',
    requireAuth,
    validate({ body: passwordChangeBodySchema }),
    asyncHandler(async (req, res) => {
      const { currentPassword, newPassword } = passwordChangeBodySchema.parse(req.body);
      if (typeof newPassword !== 'string' || !checkPasswordLength(newPassword)) {
        throw new InvalidPasswordError();
      }
      const login = getCurrentUserLogin(req);
      if (!login) {
        throw new InternalServerError('Current user login not found');
      }
      await userService.changePassword(login, currentPassword, newPassword);
      res.status(200).end();
    })
  );

  router.post(
    '/account/reset-password/init',
    createCredentialRateLimiter(),
    express.text({ type: '*/*' }),
    asyncHandler(async (req, res) => {
      const mail = readMail(req.body);
      if (mail.length > 0) {
        const user = await userService.requestPasswordReset(mail);
        if (user) {
          log.info({ login: user.login }, 'Password reset requested');
        } else {
          log.warn('Password reset requested for unknown or inactive e-mail');
        }
      }
      res.status(200).end();
    })
  );

  router.post(
    '/account/reset-password/finish',
    validate({ body: keyAndPasswordBodySchema }),
    asyncHandler(async (req, res) => {
      const { key, newPassword } = keyAndPasswordBodySchema.parse(req.body);
      if (typeof newPassword !== 'string' || !checkPasswordLength(newPassword)) {
        throw new InvalidPasswordError();
      }
      const user = await userService.completePasswordReset(newPassword, key);
      if (!user) {
        throw new InternalServerError('No user was found for this reset key');
      }
      res.status(200).end();
    })
  );

  return router;
}
