import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';

/**
 * Request pipeline shared by the server and the e2e suites.
 *
 * `trust proxy` decides how Express resolves `request.ip`, which the rate limiter
 * and the metrics allow-list both key on.
 */
export function configureApp(app: NestExpressApplication): void {
  const trustProxy = app.get(ConfigService).get<boolean | number | string>('http.trustProxy');
  app.set('trust proxy', trustProxy ?? false);

  app.enableCors({
    origin: true,
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new AllExceptionsFilter());
}
