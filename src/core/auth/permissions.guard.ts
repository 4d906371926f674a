import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { logger } from '../logger/logger.config';
import { PERMISSIONS_KEY } from './auth.decorators';
import {
  AuthenticatedRequest,
  Caller,
  USER_GROUP_HEADER,
  USER_ID_HEADER,
} from './caller.interface';
import { hasPermission, isUserGroup, Permission } from './permissions';

/**
 * Resolves the caller from the trusted identity headers and checks the
 * permissions declared with `@RequirePermissions`. Routes without declared
 * permissions are left open.
 */
@Injectable()
export class PermissionsGuard implements CanActivate {
  private readonly logger = logger();

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<
      Permission[] | undefined
    >(PERMISSIONS_KEY, [context.getHandler(), context.getClass()]);

    if (!required || required.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const caller = this.resolveCaller(request);

    const missing = required.filter(
      (permission) => !hasPermission(caller.group, permission),
    );
    if (missing.length > 0) {
      this.logger.warn(
        { userId: caller.userId, group: caller.group, missing },
        'Permission denied',
      );
      throw new ForbiddenException('Permission denied');
    }

    request.caller = caller;
    return true;
  }

  private resolveCaller(request: AuthenticatedRequest): Caller {
    const rawUserId = request.header(USER_ID_HEADER);
    const rawGroup = request.header(USER_GROUP_HEADER);

    if (!rawUserId || !/^[1-9]\d*$/.test(rawUserId)) {
      throw new UnauthorizedException('Missing or invalid user id');
    }
    if (!rawGroup || !isUserGroup(rawGroup)) {
      throw new UnauthorizedException('Missing or invalid user group');
    }

    return { userId: Number.parseInt(rawUserId, 10), group: rawGroup };
  }
}
