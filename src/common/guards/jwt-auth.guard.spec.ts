import { Logger, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { JwtService } from '@nestjs/jwt';
import { JwtAuthGuard } from './jwt-auth.guard';
import { TokenPayload } from '../../auth/domain/token-payload';

interface FakeRequest {
  headers: { authorization?: string };
  method: string;
  url: string;
  user?: unknown;
}

const createRequest = (authorization?: string): FakeRequest => ({
  headers: authorization === undefined ? {} : { authorization },
  method: 'GET',
  url: '/api/reservations',
});

describe('JwtAuthGuard', () => {
  const jwtService = new JwtService({ secret: 'test-secret' });
  let guard: JwtAuthGuard;

  const payload: TokenPayload = {
    sub: 'user-1',
    email: 'viewer@example.com',
    isStaff: false,
    tokenType: 'access',
  };

  beforeEach(() => {
    guard = new JwtAuthGuard(jwtService);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('유효한 액세스 토큰이면 요청에 사용자를 붙인다', async () => {
    // given
    const request = createRequest(`Bearer ${await jwtService.signAsync(payload)}`);

    // when
    const allowed = await guard.canActivate(new ExecutionContextHost([request]));

    // then
    expect(allowed).toBe(true);
    expect(request.user).toEqual({ id: 'user-1', email: 'viewer@example.com', isStaff: false });
  });

  it('토큰이 없으면 TOKEN_MISSING으로 거부한다', async () => {
    // when
    const error = await guard
      .canActivate(new ExecutionContextHost([createRequest()]))
      .catch((e: unknown) => e);

    // then
    expect(error).toBeInstanceOf(UnauthorizedException);
    expect(error).toMatchObject({ response: { errorCode: 'TOKEN_MISSING' } });
  });

  it('Bearer가 아닌 스킴은 토큰이 없는 것으로 본다', async () => {
    // when
    const error = await guard
      .canActivate(new ExecutionContextHost([createRequest('Basic abc')]))
      .catch((e: unknown) => e);

    // then
    expect(error).toMatchObject({ response: { errorCode: 'TOKEN_MISSING' } });
  });

  it('서명이 다른 토큰은 TOKEN_INVALID로 거부한다', async () => {
    // given
    const forged = await new JwtService({ secret: 'other-secret' }).signAsync(payload);

    // when
    const error = await guard
      .canActivate(new ExecutionContextHost([createRequest(`Bearer ${forged}`)]))
      .catch((e: unknown) => e);

    // then
    expect(error).toBeInstanceOf(UnauthorizedException);
    expect(error).toMatchObject({ response: { errorCode: 'TOKEN_INVALID' } });
  });

  it('리프레시 토큰으로는 접근할 수 없다', async () => {
    // given
    const refresh = await jwtService.signAsync({ ...payload, tokenType: 'refresh' });
    const request = createRequest(`Bearer ${refresh}`);

    // when
    const error = await guard
      .canActivate(new ExecutionContextHost([request]))
      .catch((e: unknown) => e);

    // then
    expect(error).toMatchObject({
      response: { errorCode: 'TOKEN_INVALID', message: '액세스 토큰이 아닙니다.' },
    });
    expect(request.user).toBeUndefined();
  });
});
