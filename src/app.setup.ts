import { INestApplication, ValidationPipe, ValidationPipeOptions } from '@nestjs/common';
import { ValidationError as FieldError } from 'class-validator';
import { CoreExceptionFilter } from './common/core-exception.filter';
import { ValidationError } from './common/errors';

export const API_PREFIX = 'api/v1';

function describeFieldError(error: FieldError): string[] {
  return [
    ...Object.values(error.constraints ?? {}),
    ...(error.children ?? []).flatMap(describeFieldError),
  ];
}

export function configureApp(app: INestApplication): INestApplication {
  const validationPipeOptions: ValidationPipeOptions = {
    forbidNonWhitelisted: true,
    whitelist: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
    // request bodies fail with the same error shape as the core rules
    exceptionFactory: (errors: FieldError[]) =>
      new ValidationError(errors.flatMap(describeFieldError).join('; ')),
  };

  app.setGlobalPrefix(API_PREFIX);
  app.useGlobalPipes(new ValidationPipe(validationPipeOptions));
  app.useGlobalFilters(new CoreExceptionFilter());
  return app;
}
