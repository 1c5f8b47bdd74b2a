import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { DirectoryModule } from '../directory/directory.module';
import { ScimGroupsController } from './controllers/scim-groups.controller';
import { ScimUsersController } from './controllers/scim-users.controller';
import { ScimExceptionFilter } from './filters/scim-exception.filter';

@Module({
  imports: [DirectoryModule],
  controllers: [ScimUsersController, ScimGroupsController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: ScimExceptionFilter,
    },
  ],
})
export class ScimModule {}
