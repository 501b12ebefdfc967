import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AccountHealthService } from './accounts/account-health.service';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule);

  const config = new DocumentBuilder()
    .setTitle('Session Fan-out API')
    .setDescription(
      'Control plane for broadcasting operations across a pool of Telegram user sessions',
    )
    .setVersion('1.0')
    .addBearerAuth()
    .addTag('Broadcasts', 'Fan-out operations and the retry queue')
    .addTag('Accounts', 'Account health and audit log')
    .addTag('Live monitors', 'Live event watcher')
    .addTag('Health', 'Liveness')
    .build();
  const documentFactory = () => SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, documentFactory);

  configureApp(app);
  app.enableCors();
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const accountHealth = app.get(AccountHealthService);
  const port = configService.get<number>('port') || 3000;

  if (!configService.get<number>('telegram.apiId')) {
    logger.warn('TELEGRAM_API_ID / TELEGRAM_API_HASH are not set; sessions cannot connect');
  }

  if (!accountHealth.hasAccounts()) {
    logger.warn('='.repeat(60));
    logger.warn('NO ACCOUNTS CONFIGURED');
    logger.warn('='.repeat(60));
    logger.warn('');
    logger.warn('Add saved sessions as environment entries, for example:');
    logger.warn(
      `  TG_ACCOUNTS_1='{"displayName":"Main","session":"<string session>"}'`,
    );
    logger.warn('='.repeat(60));
  } else {
    const count = accountHealth.getAccountCount();
    logger.log(`Loaded ${count} account(s) for rotation`);
  }

  await app.listen(port);

  logger.log('='.repeat(60));
  logger.log(`Session fan-out running on http://localhost:${port}`);
  logger.log('');
  logger.log('Endpoints:');
  logger.log(`  POST /broadcasts               - Start a broadcast`);
  logger.log(`  GET  /broadcasts/retries       - Retry queue status`);
  logger.log(`  GET  /accounts/health          - Account health summary`);
  logger.log(`  GET  /accounts/status          - Account status`);
  logger.log(`  POST /monitors                 - Watch a target for live events`);
  logger.log(`  POST /monitors/watcher/start   - Start the live watcher`);
  logger.log(`  GET  /docs                     - Swagger UI`);
  logger.log('='.repeat(60));
}
void bootstrap();
