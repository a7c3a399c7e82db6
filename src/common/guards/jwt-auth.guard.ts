import { ExecutionContext, Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { RequestContextService } from '../context/request-context.service';
import { DomainError, ErrorKind } from '../errors';
import { CurrentUserPayload, isCurrentUser } from '../types/current-user.type';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  constructor(private readonly context: RequestContextService) {
    super();
  }

  handleRequest<TUser = CurrentUserPayload>(err: unknown, user: TUser | false, _info: unknown, _ctx: ExecutionContext): TUser {
    if (err instanceof Error) throw err;
    if (!user) {
      throw new DomainError(ErrorKind.UNAUTHORIZED, 'Authentication required');
    }
    if (isCurrentUser(user)) {
      this.context.set('userId', user.userId);
      this.context.set('role', user.role);
    }
    return user;
  }
}
