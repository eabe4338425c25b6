import { Global, Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { appConfig } from '../config/app.config';
import { UserModule } from '../user/user.module';
import { AuthService } from './auth.service';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { UserController } from '../interfaces/controllers/user.controller';

/**
 * JwtService와 JwtAuthGuard를 모든 모듈에서 쓸 수 있도록 전역으로 노출합니다.
 */
@Global()
@Module({
  imports: [
    UserModule,
    JwtModule.registerAsync({
      inject: [appConfig.KEY],
      useFactory: (config: ConfigType<typeof appConfig>) => ({
        secret: config.jwt.secret,
      }),
    }),
  ],
  controllers: [UserController],
  providers: [AuthService, JwtAuthGuard],
  exports: [AuthService, JwtAuthGuard, JwtModule],
})
export class AuthModule {}
