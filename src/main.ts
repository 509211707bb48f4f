import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { logConfigurationSummary } from './config/config.utils';
import type { ReputationConfiguration } from './config/config.types';
import { getErrorMessage, getErrorStack } from './shared/error.utils';

/**
 * BootStrap
 */
async function bootstrap() {
  const logger = new Logger('bootstrap');

  try {
    const isDevelopment = process.env.REPUTATION_ENVIRONMENT === 'development';
    const app = await NestFactory.create(AppModule, {
      logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
    });

    app.enableShutdownHooks();

    const config = app.get<ConfigService>(ConfigService);
    const reputationConfig = config.get<ReputationConfiguration>('reputation');

    if (!reputationConfig) {
      logger.error('Reputation configuration failed to load');
      process.exit(1);
    }

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown`);
      try {
        await app.close();
        logger.log('Application closed successfully');
        process.exit(0);
      } catch (shutdownError) {
        logger.error(`Error during shutdown: ${getErrorMessage(shutdownError)}`, getErrorStack(shutdownError));
        process.exit(1);
      }
    };

    const handleSignal = (signal: NodeJS.Signals) => {
      void shutdown(signal);
    };

    process.on('SIGTERM', handleSignal);
    process.on('SIGINT', handleSignal);

    if (reputationConfig.environment === 'development') {
      logger.log(`RUNNING IN DEVELOPMENT MODE`);
      logConfigurationSummary(reputationConfig);

      const swaggerConfig = new DocumentBuilder()
        .setTitle('SMTP Reputation Engine API')
        .setDescription('Read-only view of session history and trust held by the reputation engine.')
        .setVersion('1.0')
        .addApiKey({ type: 'apiKey', name: 'X-API-Key', in: 'header' }, 'api-key')
        .build();
      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup('api-docs', app, document);
      logger.log('Swagger UI is available at /api-docs');
    }

    await app.listen(reputationConfig.server.port);

    logger.log(`Reputation strategy: ${reputationConfig.strategy}`);
    logger.log(`SMTP reputation engine listening on port ${reputationConfig.server.port}`);
  } catch (error) {
    logger.error(`Failed to bootstrap application: ${getErrorMessage(error)}`, getErrorStack(error));
    process.exit(1);
  }
}
bootstrap().catch((error) => {
  const logger = new Logger('bootstrap');
  logger.error(`Unhandled bootstrap error: ${getErrorMessage(error)}`);
  process.exit(1);
});
