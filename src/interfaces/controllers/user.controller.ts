import { Body, Controller, Get, HttpCode, HttpStatus, Patch, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { UserService } from '../../user/user.service';
import { AuthService } from '../../auth/auth.service';
import { JwtAuthGuard } from '../../common/guards/jwt-auth.guard';
import { AuthenticatedUser, CurrentUser } from '../../common/decorators/current-user.decorator';
import {
  RefreshTokenRequest,
  RegisterRequest,
  TokenPairResponse,
  TokenRequest,
  UpdateProfileRequest,
  UserResponse,
  toUserResponse,
} from '../dto/user.dto';

@ApiTags('user')
@Controller('api/user')
export class UserController {
  constructor(
    private readonly userService: UserService,
    private readonly authService: AuthService,
  ) {}

  @Post('register')
  async register(@Body() body: RegisterRequest): Promise<UserResponse> {
    return toUserResponse(await this.userService.register(body));
  }

  @Post('token')
  @HttpCode(HttpStatus.OK)
  async issueToken(@Body() body: TokenRequest): Promise<TokenPairResponse> {
    return this.authService.login(body.email, body.password);
  }

  @Post('token/refresh')
  @HttpCode(HttpStatus.OK)
  async refreshToken(@Body() body: RefreshTokenRequest): Promise<TokenPairResponse> {
    return this.authService.refresh(body.refresh);
  }

  @Get('me')
  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  async me(@CurrentUser() user: AuthenticatedUser): Promise<UserResponse> {
    return toUserResponse(await this.userService.getProfile(user.id));
  }

  @Patch('me')
  @ApiBearerAuth()
  @UseGuards(JwtAuthGuard)
  async updateMe(
    @CurrentUser() user: AuthenticatedUser,
    @Body() body: UpdateProfileRequest,
  ): Promise<UserResponse> {
    return toUserResponse(await this.userService.updateProfile(user.id, body));
  }
}
