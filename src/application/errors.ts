/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class ApplicationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends ApplicationError {
  constructor(message = 'Unauthorized') {
    super(message);
  }
}

export class UserNotActivatedError extends ApplicationError {
  constructor(login: string) {
    super(`User ${login} was not activated`);
  }
}

export class InvalidPasswordError extends ApplicationError {
  constructor(message = 'Incorrect password') {
    super(message);
  }
}

export class PasswordNotMatchError extends ApplicationError {
  constructor(message = 'Password and confirmation do not match') {
    super(message);
  }
}

export class EmailAlreadyUsedError extends ApplicationError {
  constructor(message = 'Email is already in use!') {
    super(message);
  }
}

export class LoginAlreadyUsedError extends ApplicationError {
  constructor(message = 'Login name already used!') {
    super(message);
  }
}

export class EmailNotFoundError extends ApplicationError {
  constructor(message = 'Email address not registered') {
    super(message);
  }
}

/**
 * Raised when an operation cannot complete for a reason the caller cannot fix.
 * The message is returned to the client.
 */
export class InternalServerError extends ApplicationError {}
