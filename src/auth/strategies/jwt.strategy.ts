import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ExtractJwt, Strategy } from 'passport-jwt';
import { PassportStrategy } from '@nestjs/passport';
import { AuthPrincipal } from '../../common/security/request-context';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Access Token 校验策略
 * 签名 (HS256)、过期时间与 issuer 由 passport-jwt 校验，validate 只负责把声明转换为 AuthPrincipal
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    super({
      // 从请求头 Authorization: Bearer <token> 中提取 JWT
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow<string>('jwt.secret'),
      issuer: configService.getOrThrow<string>('jwt.issuer'),
      algorithms: ['HS256'],
      ignoreExpiration: false,
    });
  }

  // 返回值会被挂载到 req.user，再由 @CurrentActor() 组装为 RequestContext
  validate(payload: Record<string, unknown>): AuthPrincipal {
    const userId = payload['sub'];
    const roles = payload['roles'];
    const permissions = payload['permissions'];
    if (typeof userId !== 'string' || !isStringArray(roles) || !isStringArray(permissions)) {
      throw new UnauthorizedException('Invalid or missing access token');
    }
    return {
      userId,
      organizationId: optionalString(payload['org_id']),
      name: optionalString(payload['name']),
      roles,
      permissions,
    };
  }
}
