import 'reflect-metadata';
import { INestApplication, Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger as PinoLogger } from 'nestjs-pino';

import { AppModule } from './app.module';
import { AppConfigService } from './config';

function setupSwagger(app: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle('FX Rates API')
    .setDescription(
      'Currency conversion backed by a cached, priority ordered chain of rate sources',
    )
    .setVersion('1.0')
    .addTag('Rates', 'Exchange rate lookups and cache control')
    .addTag('Conversions', 'Amount conversion and conversion history')
    .addTag('Currencies', 'Supported currency catalogue')
    .addTag('Sources', 'Rate source status and toggling')
    .build();

  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, config));
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(PinoLogger));

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );
  app.enableCors();
  app.enableShutdownHooks();
  setupSwagger(app);

  const configService = app.get(AppConfigService);
  const port = configService.get('port');
  const { ttlSeconds, enabled } = configService.get('cache');
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(
    `Listening on port ${port}, rate cache ${enabled ? `on (${ttlSeconds}s)` : 'off'}`,
  );
  logger.log(`Swagger UI: http://localhost:${port}/docs`);
}

process.on('unhandledRejection', (reason) => {
  new Logger('Process').error({ err: reason }, 'Unhandled promise rejection');
});

process.on('uncaughtException', (error) => {
  new Logger('Process').error({ err: error }, 'Uncaught exception');
});

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error({ err: error }, 'Failed to start application');
  process.exit(1);
});
