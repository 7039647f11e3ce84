import 'reflect-metadata';
import { Logger, LogLevel, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

// De más a menos severo; LOG_LEVEL fija el umbral
const LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

function levelsFrom(threshold: string | undefined): LogLevel[] {
  const idx = LEVELS.findIndex((l) => l === threshold);
  return LEVELS.slice(0, idx >= 0 ? idx + 1 : 3);
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: levelsFrom(process.env.LOG_LEVEL),
  });
  const cfg = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({ whitelist: true, transform: true }),
  );

  // Habilitar CORS
  app.enableCors({
    origin: cfg.get<string>('CORS_ORIGIN') ?? 'http://localhost:3001',
    credentials: true,
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
  });

  const port = Number(cfg.get('PORT') ?? 3000);
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`API on http://localhost:${port}`);
}

bootstrap().catch((e: unknown) => {
  new Logger('Bootstrap').error(
    e instanceof Error ? (e.stack ?? e.message) : String(e),
  );
  process.exit(1);
});
