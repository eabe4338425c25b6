import { CanActivate, ExecutionContext, ForbiddenException, Injectable } from '@nestjs/common';
import { AuthenticatedRequest, getAuthenticatedUser } from '../decorators/current-user.decorator';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

/**
 * 조회는 인증된 모든 사용자에게, 변경은 스태프에게만 허용합니다.
 * JwtAuthGuard 뒤에 위치해야 합니다.
 */
@Injectable()
export class StaffOrReadOnlyGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (SAFE_METHODS.has(request.method)) {
      return true;
    }

    if (!getAuthenticatedUser(request).isStaff) {
      throw new ForbiddenException('관리자만 변경할 수 있습니다.');
    }
    return true;
  }
}
