import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { AuthenticatedRequest } from '../decorators/current-user.decorator';
import { TokenPayload } from '../../auth/domain/token-payload';

/**
 * Bearer 액세스 토큰을 검증하고 요청에 사용자 정보를 붙입니다.
 * 리프레시 토큰은 거부합니다.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(private readonly jwtService: JwtService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = this.extractTokenFromHeader(request);

    if (!token) {
      this.logSecurityEvent('AUTH_TOKEN_MISSING', request);
      throw new UnauthorizedException({
        errorCode: 'TOKEN_MISSING',
        message: '인증 토큰이 필요합니다.',
      });
    }

    let payload: TokenPayload;
    try {
      payload = await this.jwtService.verifyAsync<TokenPayload>(token);
    } catch (error) {
      this.logSecurityEvent('AUTH_TOKEN_INVALID', request, error);
      throw new UnauthorizedException({
        errorCode: 'TOKEN_INVALID',
        message: '유효하지 않거나 만료된 토큰입니다.',
      });
    }

    if (payload.tokenType !== 'access') {
      this.logSecurityEvent('AUTH_TOKEN_WRONG_TYPE', request);
      throw new UnauthorizedException({
        errorCode: 'TOKEN_INVALID',
        message: '액세스 토큰이 아닙니다.',
      });
    }

    request.user = { id: payload.sub, email: payload.email, isStaff: payload.isStaff };
    return true;
  }

  private extractTokenFromHeader(request: AuthenticatedRequest): string | undefined {
    const [type, token] = request.headers.authorization?.split(' ') ?? [];
    return type === 'Bearer' ? token : undefined;
  }

  private logSecurityEvent(event: string, request: AuthenticatedRequest, error?: unknown): void {
    this.logger.warn(`[SECURITY] ${event}`, {
      path: request.url,
      method: request.method,
      ip: request.ip ?? 'unknown',
      ...(error instanceof Error && { error: error.message }),
    });
  }
}
