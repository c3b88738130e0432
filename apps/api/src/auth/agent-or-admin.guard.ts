import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { AccessControlService } from '../common/access-control.service';
import { AuthRequest } from './current-user.decorator';

@Injectable()
export class AgentOrAdminGuard implements CanActivate {
  constructor(private readonly accessControl: AccessControlService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthRequest>();
    const user = request.user;
    if (!user || !this.accessControl.isAgentOrAdmin(user)) {
      throw new ForbiddenException(
        'This action is restricted to agents and administrators',
      );
    }
    return true;
  }
}
