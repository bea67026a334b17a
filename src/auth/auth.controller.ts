import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import { AuthUserDto, ChangePasswordDto, LoginDto, RefreshTokenDto, TokenResponseDto } from './dto/auth.dto';
import { Public } from '../common/decorators/public.decorator';
import { ClientInfo } from '../common/decorators/client-meta.decorator';
import { CurrentActor } from '../common/decorators/current-actor.decorator';
import { ClientMeta, RequestContext } from '../common/security/request-context';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Public() // 公开接口，无需登录
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() loginDto: LoginDto, @ClientInfo() client: ClientMeta): Promise<TokenResponseDto> {
    return this.authService.login(loginDto, client);
  }

  /**
   * 使用 Refresh Token 换取新的令牌对
   * 前端在 Access Token 过期(401)后调用此接口实现无感刷新
   */
  @Public() // Refresh Token 是不透明随机串，由 AuthService 自行校验
  @Post('refresh-token')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() refreshTokenDto: RefreshTokenDto, @ClientInfo() client: ClientMeta): Promise<TokenResponseDto> {
    return this.authService.refresh(refreshTokenDto, client);
  }

  @Public()
  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  async logout(@Body() refreshTokenDto: RefreshTokenDto, @ClientInfo() client: ClientMeta): Promise<void> {
    await this.authService.logout(refreshTokenDto, client);
  }

  @Get('me')
  async me(@CurrentActor() ctx: RequestContext): Promise<AuthUserDto> {
    return this.authService.me(ctx.actorUserId);
  }

  @Post('change-password')
  @HttpCode(HttpStatus.NO_CONTENT)
  async changePassword(@CurrentActor() ctx: RequestContext, @Body() changePasswordDto: ChangePasswordDto): Promise<void> {
    await this.authService.changePassword(ctx, changePasswordDto);
  }
}
