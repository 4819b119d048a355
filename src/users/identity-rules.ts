import { isEmail } from 'class-validator';
import { ValidationError } from '../common/errors';
import { EMAIL_MAX_LENGTH, USERNAME_MAX_LENGTH } from '../database/entities/user.entity';

export const RESERVED_USERNAME = 'me';
export const USERNAME_PATTERN = /^[\w.@+-]+$/;

export function assertValidUsername(username: string): void {
  if (username.length === 0 || username.length > USERNAME_MAX_LENGTH) {
    throw new ValidationError(
      `Username must be between 1 and ${USERNAME_MAX_LENGTH} characters`,
    );
  }
  if (!USERNAME_PATTERN.test(username)) {
    throw new ValidationError(
      'Username may only contain letters, digits and @/./+/-/_',
    );
  }
  if (username === RESERVED_USERNAME) {
    throw new ValidationError(`The username "${RESERVED_USERNAME}" is reserved`);
  }
}

export function assertValidEmail(email: string): void {
  if (email.length > EMAIL_MAX_LENGTH || !isEmail(email)) {
    throw new ValidationError('Enter a valid email address');
  }
}
