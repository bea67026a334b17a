import { IsNotEmpty, IsString, MaxLength, MinLength } from 'class-validator';
import { UserStatus } from '../../user/entities/user.entity';

export class LoginDto {
  /**
   * 邮箱 (大小写不敏感) 或手机号
   */
  @IsString()
  @IsNotEmpty()
  readonly identifier!: string;

  @IsString()
  @IsNotEmpty()
  readonly password!: string;
}

export class RefreshTokenDto {
  @IsString()
  @IsNotEmpty()
  readonly refreshToken!: string;
}

export class ChangePasswordDto {
  @IsString()
  @IsNotEmpty()
  readonly currentPassword!: string;

  // bcrypt 只取前 72 字节
  @IsString()
  @MinLength(8)
  @MaxLength(72)
  readonly newPassword!: string;
}

/**
 * 当前用户信息，permissions 为本次请求实时解析的结果
 */
export class AuthUserDto {
  id!: string;
  orgId!: string;
  fullName!: string;
  email!: string | null;
  phone!: string | null;
  status!: UserStatus;
  roleIds!: string[];
  roleCodes!: string[];
  permissions!: string[];
}

/**
 * 双 Token 响应结构
 */
export class TokenResponseDto {
  /**
   * 访问令牌，有效期较短 (默认 15m)，用于请求业务接口
   */
  accessToken!: string;

  /**
   * 刷新令牌，不透明随机串，仅用于换取新的令牌对，每次使用后即失效
   */
  refreshToken!: string;

  tokenType!: 'Bearer';

  /**
   * accessToken 剩余有效秒数
   */
  expiresIn!: number;

  user!: AuthUserDto;
}
