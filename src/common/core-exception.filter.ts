import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { TypeORMError } from 'typeorm';
import { CoreError, ErrorKind, UnavailableError } from './errors';
import { translateStorageError } from './storage-errors';

const STATUS_BY_KIND: Record<ErrorKind, HttpStatus> = {
  ValidationError: HttpStatus.BAD_REQUEST,
  Unauthenticated: HttpStatus.UNAUTHORIZED,
  Forbidden: HttpStatus.FORBIDDEN,
  NotFound: HttpStatus.NOT_FOUND,
  Conflict: HttpStatus.CONFLICT,
  Unavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

export function statusForKind(kind: ErrorKind): HttpStatus {
  return STATUS_BY_KIND[kind];
}

/**
 * Storage errors raised outside a unit of work (plain reads) are translated
 * here, so they reach the client as the same kinds.
 */
@Catch(CoreError, TypeORMError)
export class CoreExceptionFilter implements ExceptionFilter<CoreError | TypeORMError> {
  private readonly logger = new Logger(CoreExceptionFilter.name);

  catch(exception: CoreError | TypeORMError, host: ArgumentsHost) {
    const error = this.toCoreError(exception);
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = statusForKind(error.kind);
    response.status(statusCode).json({
      statusCode,
      error: error.kind,
      message: error.message,
    });
  }

  private toCoreError(exception: CoreError | TypeORMError): CoreError {
    if (exception instanceof CoreError) {
      return exception;
    }
    const translated = translateStorageError(exception);
    const error =
      translated instanceof CoreError ? translated : new UnavailableError({ cause: exception });
    if (error instanceof UnavailableError) {
      this.logger.error('Storage failure outside a transaction', exception.stack);
    }
    return error;
  }
}
