import { ForbiddenException, Injectable, Logger, NotFoundException, UnauthorizedException } from '@nestjs/common';
import { UserService } from '../user/user.service';
import { User } from '../user/entities/user.entity';
import { HashingService } from '../common/hashing/hashing.service';
import { PermissionResolverService } from '../permission/permission-resolver.service';
import { AUDIT_ACTION, AUDIT_RESOURCE } from '../audit/audit.constants';
import { AccessTokenService } from './access-token/access-token.service';
import { RefreshTokenService } from './refresh-token';
import { AuthUserDto, ChangePasswordDto, LoginDto, RefreshTokenDto, TokenResponseDto } from './dto/auth.dto';
import { ClientMeta, RequestContext } from '../common/security/request-context';

/**
 * 认证流程编排
 *
 * 每次签发 Access Token 前都从数据库重新解析权限，
 * 角色或权限的变更最迟在下一次刷新时生效。
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userService: UserService,
    private readonly hashingService: HashingService,
    private readonly permissionResolver: PermissionResolverService,
    private readonly accessTokenService: AccessTokenService,
    private readonly refreshTokenService: RefreshTokenService,
  ) {}

  async login(loginDto: LoginDto, client: ClientMeta): Promise<TokenResponseDto> {
    const user = await this.userService.findByLoginIdentifier(loginDto.identifier);
    // 用户不存在、未设置密码、密码错误统一返回同一个错误
    if (!user) {
      throw new UnauthorizedException('Invalid credentials');
    }
    // 停用账号先于密码校验被拒绝，不再进行哈希比对
    this.ensureActive(user);
    const isPasswordValid = await this.hashingService.compare(loginDto.password, user.passwordHash);
    if (!isPasswordValid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const permissions = await this.permissionResolver.resolvePermissionCodes(user.id);
    // 登录审计与 refresh token 写入同一事务
    const refreshToken = await this.refreshTokenService.issue(user.id, client, user.id, [
      {
        actorUserId: user.id,
        action: AUDIT_ACTION.LOGIN,
        resource: AUDIT_RESOURCE.AUTH,
        targetIds: [user.id],
        ipAddress: client.ipAddress,
        userAgent: client.userAgent,
      },
    ]);
    this.logger.log(`User ${user.id} logged in`);
    return this.buildTokenResponse(user, permissions, refreshToken);
  }

  /**
   * 使用 Refresh Token 换取新的令牌对
   * 旧令牌被原子撤销，权限按数据库当前状态重新解析
   */
  async refresh(refreshTokenDto: RefreshTokenDto, client: ClientMeta): Promise<TokenResponseDto> {
    const current = await this.refreshTokenService.requireValid(refreshTokenDto.refreshToken);
    const user = await this.userService.findById(current.userId);
    if (!user) {
      throw new UnauthorizedException('User not found');
    }
    this.ensureActive(user);

    const refreshToken = await this.refreshTokenService.rotate(refreshTokenDto.refreshToken, client, user.id);
    const permissions = await this.permissionResolver.resolvePermissionCodes(user.id);
    return this.buildTokenResponse(user, permissions, refreshToken);
  }

  /**
   * 只撤销提交的这一个令牌，其他设备上的会话不受影响
   */
  async logout(refreshTokenDto: RefreshTokenDto, client: ClientMeta): Promise<void> {
    const current = await this.refreshTokenService.requireValid(refreshTokenDto.refreshToken);
    await this.refreshTokenService.revoke(refreshTokenDto.refreshToken, client, current.userId);
  }

  async me(userId: string): Promise<AuthUserDto> {
    const user = await this.userService.findById(userId);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    const permissions = await this.permissionResolver.resolvePermissionCodes(user.id);
    return this.toAuthUser(user, permissions);
  }

  async changePassword(ctx: RequestContext, changePasswordDto: ChangePasswordDto): Promise<void> {
    const user = await this.userService.findById(ctx.actorUserId);
    if (!user) {
      throw new NotFoundException('User not found');
    }
    const isPasswordValid = await this.hashingService.compare(changePasswordDto.currentPassword, user.passwordHash);
    if (!isPasswordValid) {
      throw new UnauthorizedException('Invalid credentials');
    }

    const passwordHash = await this.hashingService.hash(changePasswordDto.newPassword);
    await this.userService.updatePasswordHash(ctx, user.id, passwordHash);
  }

  private ensureActive(user: User): void {
    if (user.status !== 'active') {
      throw new ForbiddenException('User is inactive');
    }
  }

  private async buildTokenResponse(
    user: User,
    permissions: string[],
    refreshToken: string,
  ): Promise<TokenResponseDto> {
    return {
      accessToken: await this.accessTokenService.createAccessToken(user, permissions),
      refreshToken,
      tokenType: 'Bearer',
      expiresIn: this.accessTokenService.accessTokenTtlSeconds(),
      user: this.toAuthUser(user, permissions),
    };
  }

  private toAuthUser(user: User, permissions: string[]): AuthUserDto {
    return {
      id: user.id,
      orgId: user.orgId,
      fullName: user.fullName,
      email: user.email,
      phone: user.phone,
      status: user.status,
      roleIds: [...user.roleIds],
      roleCodes: [...user.roleCodes],
      permissions,
    };
  }
}
