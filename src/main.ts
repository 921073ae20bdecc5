import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { logConfigurationSummary } from './config/config.utils';
import type { MsgApiConfiguration } from './config/config.types';
import { DEFAULT_SERVER_PORT } from './config/config.constants';
import { getErrorMessage } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const port = config.get<number>('msgapi.main.port', DEFAULT_SERVER_PORT);
    const environment = config.get<string>('msgapi.environment');
    const origin = config.get<string>('msgapi.main.origin', '*');

    if (environment === 'development') {
      app.enableCors();
      logger.log(`RUNNING IN DEVELOPMENT MODE`);

      const apiConfig = config.get<MsgApiConfiguration>('msgapi');
      if (apiConfig) {
        logConfigurationSummary(apiConfig);
      }

      const swaggerConfig = new DocumentBuilder()
        .setTitle('Message API')
        .setDescription('Message lookup, delivery history and message listing with selectable expansions.')
        .setVersion('1.0')
        .addApiKey({ type: 'apiKey', name: 'X-Server-API-Key', in: 'header' }, 'server-api-key')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    } else {
      app.enableCors({ origin });
      logger.log(`Accepting requests from origin "${origin}"`);
    }

    await app.listen(port);
    logger.log(`Message API listening on port ${port}`);
  } catch (error) {
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, errorStack);
    process.exit(1);
  }
}

bootstrap().catch((err: unknown) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(err)}`);
  process.exit(1);
});
