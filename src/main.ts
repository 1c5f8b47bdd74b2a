import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';
import { configureApp } from './modules/app/app.setup';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  // Trust the reverse proxy so req.protocol and req.ip describe the client.
  app.set('trust proxy', true);
  app.enableShutdownHooks();
  app.useLogger(new Logger('ScimDirectory'));

  configureApp(app);

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`SCIM directory listening on http://localhost:${port}/scim/{v1,v2}`);
  Logger.log(`Recent logs: http://localhost:${port}/admin/logs/recent?limit=25`);
}

void bootstrap();
