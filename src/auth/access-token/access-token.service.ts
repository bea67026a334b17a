import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { User } from '../../user/entities/user.entity';
import { parseExpiresInToSeconds } from '../../common/utils/duration.util';

/**
 * Access Token 声明
 * iat / exp / iss 由 JwtService 在签名时写入
 */
export interface AccessTokenClaims {
  sub: string;
  org_id: string | null;
  roles: string[];
  permissions: string[];
  name: string | null;
  iss?: string;
  iat?: number;
  exp?: number;
}

/**
 * Access Token 签发
 *
 * permissions 由调用方在签发前从数据库重新解析，令牌本身不做任何缓存。
 * 签名算法、密钥与 issuer 由 AuthModule 中的 JwtModule 统一配置。
 */
@Injectable()
export class AccessTokenService {
  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  async createAccessToken(user: User, permissionCodes: readonly string[]): Promise<string> {
    const claims: AccessTokenClaims = {
      sub: user.id,
      org_id: user.orgId,
      roles: [...user.roleCodes],
      permissions: [...permissionCodes],
      name: user.fullName,
    };
    return this.jwtService.signAsync(claims, { expiresIn: this.accessTokenTtlSeconds() });
  }

  accessTokenTtlSeconds(): number {
    return parseExpiresInToSeconds(this.configService.get<string>('jwt.accessExpiresIn') ?? '15m');
  }
}
