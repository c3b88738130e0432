import { Global, Module } from '@nestjs/common';
import { USER_DIRECTORY } from './user-directory';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';

@Global()
@Module({
  controllers: [UsersController],
  providers: [
    UsersService,
    { provide: USER_DIRECTORY, useExisting: UsersService },
  ],
  exports: [USER_DIRECTORY],
})
export class UsersModule {}
