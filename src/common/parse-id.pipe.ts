import { ParseIntPipe } from '@nestjs/common';
import { ValidationError } from './errors';

/** Path id parser whose failures render like every other core error. */
export const ParseIdPipe = new ParseIntPipe({
  exceptionFactory: (message: string) => new ValidationError(message),
});
