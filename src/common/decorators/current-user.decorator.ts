import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';

/**
 * 인증 가드가 요청에 붙여 둔 사용자 정보
 */
export interface AuthenticatedUser {
  id: string;
  email: string;
  isStaff: boolean;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

export const getAuthenticatedUser = (request: AuthenticatedRequest): AuthenticatedUser => {
  if (!request.user) {
    throw new UnauthorizedException('인증이 필요합니다.');
  }
  return request.user;
};

/**
 * @example
 * ```typescript
 * @Get('me')
 * @UseGuards(JwtAuthGuard)
 * async getProfile(@CurrentUser() user: AuthenticatedUser) {}
 * ```
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedUser =>
    getAuthenticatedUser(ctx.switchToHttp().getRequest<AuthenticatedRequest>()),
);
