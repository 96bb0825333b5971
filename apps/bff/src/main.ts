import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { TRACE_HEADER } from './common/response-meta.js';
import { AppModule } from './modules/app.module.js';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true
  });
  app.enableShutdownHooks();

  const cfg = app.get(ConfigService);
  app.enableCors({
    origin: cfg.get<string[]>('corsOrigins', []),
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['content-type', 'authorization', 'x-requested-with', TRACE_HEADER],
    exposedHeaders: [TRACE_HEADER],
    credentials: true,
    optionsSuccessStatus: 204
  });

  const port = cfg.get<number>('port', 3001);
  Logger.log(
    `Config: custody=${cfg.get<string>('staking.custodyAddress')} stateFile=${cfg.get<string>('staking.stateFile') ?? '(memory only)'} ` +
      `admins=${cfg.get<string[]>('staking.admins', []).length}`,
    'Bootstrap'
  );
  await app.listen(port);
  Logger.log(`BFF listening on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to bootstrap BFF', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
