import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { IoAdapter } from '@nestjs/platform-socket.io';
import { AppModule } from './app.module';
import { EngineErrorFilter } from './auction/engine-error.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const corsOrigin = process.env.CORS_ORIGIN;
  app.enableCors({
    origin: corsOrigin ? corsOrigin.split(',') : true,
    credentials: true,
  });
  app.useWebSocketAdapter(new IoAdapter(app));
  app.useGlobalFilters(new EngineErrorFilter());
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('port') ?? 3000;
  await app.listen(port);
  new Logger('Bootstrap').log(`Escrow auction service listening on ${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
