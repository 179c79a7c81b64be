import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  EmailAlreadyUsedError,
  EmailNotFoundError,
  InternalServerError,
  InvalidPasswordError,
  LoginAlreadyUsedError,
  PasswordNotMatchError,
  UnauthorizedError,
  UserNotActivatedError,
} from '../../../application/errors.js';
import { logger } from '../../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface ErrorMapping {
  type: abstract new (...args: never[]) => Error;
  status: number;
  code: string;
}

const ERROR_MAPPINGS: readonly ErrorMapping[] = [
  { type: InvalidPasswordError, status: 400, code: 'INVALID_PASSWORD' },
  { type: PasswordNotMatchError, status: 400, code: 'PASSWORD_NOT_MATCH' },
  { type: EmailAlreadyUsedError, status: 400, code: 'EMAIL_ALREADY_USED' },
  { type: LoginAlreadyUsedError, status: 400, code: 'LOGIN_ALREADY_USED' },
  { type: EmailNotFoundError, status: 400, code: 'EMAIL_NOT_FOUND' },
  { type: UnauthorizedError, status: 401, code: 'UNAUTHORIZED' },
  { type: UserNotActivatedError, status: 401, code: 'USER_NOT_ACTIVATED' },
  { type: InternalServerError, status: 500, code: 'INTERNAL_ERROR' },
];

const log = logger.child({ component: 'errorHandler' });

// body-parser marks unparsable JSON with this type
function isMalformedBody(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

function send(res: Response, status: number, body: ErrorResponse): void {
  res.status(status).json(body);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    log.warn({ path: req.path, issues: err.errors.length }, 'Validation failed');
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  if (isMalformedBody(err)) {
    log.warn({ path: req.path }, 'Malformed request body');
    send(res, 400, { code: 'MALFORMED_BODY', message: 'Request body could not be parsed' });
    return;
  }

  const mapping = ERROR_MAPPINGS.find((m) => err instanceof m.type);
  if (mapping) {
    if (mapping.status >= 500) {
      log.error({ err, path: req.path }, err.message);
    } else {
      log.warn({ path: req.path, code: mapping.code }, err.message);
    }
    send(res, mapping.status, { code: mapping.code, message: err.message });
    return;
  }

  log.error({ err, path: req.path }, 'Unhandled error');
  send(res, 500, {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  });
}
