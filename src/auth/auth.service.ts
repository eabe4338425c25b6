import { Injectable, Inject, UnauthorizedException, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { appConfig } from '../config/app.config';
import { UserService } from '../user/user.service';
import { User } from '../user/domain/user.entity';
import { TokenPair, TokenPayload, TokenType } from './domain/token-payload';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userService: UserService,
    private readonly jwtService: JwtService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  async login(email: string, password: string): Promise<TokenPair> {
    const user = await this.userService.verifyCredentials(email, password);
    if (!user) {
      this.logger.warn(`[SECURITY] 로그인 실패: ${email}`);
      throw new UnauthorizedException({
        errorCode: 'INVALID_CREDENTIALS',
        message: '이메일 또는 비밀번호가 올바르지 않습니다.',
      });
    }
    return this.issueTokens(user);
  }

  /**
   * 리프레시 토큰으로 새 토큰 쌍을 발급합니다.
   * 토큰 발급 이후 바뀐 권한이 반영되도록 사용자를 다시 조회합니다.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    let payload: TokenPayload;
    try {
      payload = await this.jwtService.verifyAsync<TokenPayload>(refreshToken);
    } catch (error) {
      this.logger.warn(
        `[SECURITY] 리프레시 토큰 검증 실패: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw invalidRefreshToken();
    }
    if (payload.tokenType !== 'refresh') {
      throw invalidRefreshToken();
    }

    const user = await this.userService.findById(payload.sub);
    if (!user) {
      throw invalidRefreshToken();
    }
    return this.issueTokens(user);
  }

  private async issueTokens(user: User): Promise<TokenPair> {
    const [access, refresh] = await Promise.all([
      this.sign(user, 'access', this.config.jwt.accessExpiresIn),
      this.sign(user, 'refresh', this.config.jwt.refreshExpiresIn),
    ]);
    return { access, refresh };
  }

  private sign(user: User, tokenType: TokenType, expiresIn: string): Promise<string> {
    const payload: TokenPayload = {
      sub: user.id,
      email: user.email,
      isStaff: user.isStaff,
      tokenType,
    };
    return this.jwtService.signAsync(payload, { expiresIn });
  }
}

const invalidRefreshToken = (): UnauthorizedException =>
  new UnauthorizedException({
    errorCode: 'TOKEN_INVALID',
    message: '유효하지 않거나 만료된 리프레시 토큰입니다.',
  });
