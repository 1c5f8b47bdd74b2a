import { Module } from '@nestjs/common';

import { DirectoryModule } from '../directory/directory.module';
import { AdminController } from './admin.controller';

@Module({
  imports: [DirectoryModule],
  controllers: [AdminController],
})
export class AdminModule {}
