import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { ConfigValidationService } from './common/config/config-validation.service';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const logger = new Logger('Bootstrap');

  app.get(ConfigValidationService).validate();
  app.enableShutdownHooks();

  configureApp(app);

  const config = new DocumentBuilder()
    .setTitle('Jewelify API')
    .setDescription('OTP registration, sessions and face/jewelry compatibility predictions')
    .setVersion('1.0')
    .addTag('Authentication', 'Registration, OTP and session endpoints')
    .addTag('Predictions', 'Compatibility scoring and recommendations')
    .addTag('History', 'Past predictions')
    .addBearerAuth(
      {
        type: 'http',
        scheme: 'bearer',
        description: 'Enter your access token',
      },
      'bearer',
    )
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      defaultModelsExpandDepth: 1,
      defaultModelExpandDepth: 1,
    },
  });

  const port = app.get(ConfigService).getOrThrow<number>('port');
  await app.listen(port);

  logger.log(`Jewelify API listening on http://localhost:${port} (docs at /api/docs)`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
