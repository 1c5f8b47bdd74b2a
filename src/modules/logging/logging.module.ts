import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';

import { LogConfigController } from './log-config.controller';
import { ScimLogger } from './scim-logger.service';
import { RequestLoggingInterceptor } from './request-logging.interceptor';

@Global()
@Module({
  controllers: [LogConfigController],
  providers: [
    ScimLogger,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor,
    },
  ],
  exports: [ScimLogger],
})
export class LoggingModule {}
