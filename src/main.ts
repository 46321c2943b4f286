import 'reflect-metadata';
import { LogLevel, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import type { Server } from 'node:http';
import { AppModule } from './app.module';

export interface ServeOptions {
  host?: string;
  port?: number;
  logLevels?: LogLevel[];
}

/**
 * Start the HTTP API. Host and port fall back to HOST / PORT from the
 * environment, then to 127.0.0.1:8000.
 */
export async function bootstrap(
  options: ServeOptions = {},
): Promise<NestExpressApplication> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    ...(options.logLevels ? { logger: options.logLevels } : {}),
  });
  const config = app.get(ConfigService);

  // Uploads travel base64 encoded inside the JSON body
  app.useBodyParser('json', {
    limit: config.get<string>('MAX_UPLOAD_SIZE', '25mb'),
  });

  // Increase server timeout for large file uploads (5 minutes)
  const server: Server = app.getHttpServer();
  server.setTimeout(300000);

  const host = options.host ?? config.get<string>('HOST', '127.0.0.1');
  const port = options.port ?? Number(config.get<string>('PORT', '8000'));
  await app.listen(port, host);

  new Logger('Bootstrap').log(`Listening on http://${host}:${port}`);
  return app;
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    new Logger('Bootstrap').error(
      `Server failed to start: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exitCode = 1;
  });
}
