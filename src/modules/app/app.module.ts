import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AdminModule } from '../admin/admin.module';
import { AuthModule } from '../auth/auth.module';
import { DirectoryModule } from '../directory/directory.module';
import { LoggingModule } from '../logging/logging.module';
import { ScimModule } from '../scim/scim.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggingModule,
    AuthModule,
    DirectoryModule,
    ScimModule,
    AdminModule,
  ],
})
export class AppModule {}
