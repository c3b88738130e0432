import { Controller, Get, Inject, Query, UseGuards } from '@nestjs/common';
import { AgentOrAdminGuard } from '../auth/agent-or-admin.guard';
import { CurrentUser, type AuthUser } from '../auth/current-user.decorator';
import { ListUsersDto } from './dto/list-users.dto';
import { USER_DIRECTORY, type UserDirectory } from './user-directory';

@Controller('users')
export class UsersController {
  constructor(
    @Inject(USER_DIRECTORY) private readonly directory: UserDirectory,
  ) {}

  @Get()
  @UseGuards(AgentOrAdminGuard)
  async list(@Query() query: ListUsersDto) {
    const users = await this.directory.list({ role: query.role });
    return users.map(({ id, email, displayName, role }) => ({
      id,
      email,
      displayName,
      role,
    }));
  }

  @Get('me')
  me(@CurrentUser() user: AuthUser) {
    return user;
  }
}
