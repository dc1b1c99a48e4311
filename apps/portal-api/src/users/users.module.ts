import { Module } from '@nestjs/common';
import { DatabaseModule } from '@portal/common/database';
import { UserDirectoryService } from './user-directory.service';

@Module({
  imports: [DatabaseModule],
  providers: [UserDirectoryService],
  exports: [UserDirectoryService],
})
export class UsersModule {}
