import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { AccessTokenService } from './access-token/access-token.service';
import { RefreshToken, REFRESH_TOKEN_STORE, RefreshTokenService, TypeOrmRefreshTokenStore } from './refresh-token';
import { JwtStrategy } from './strategies/jwt.strategy';
import { UserModule } from '../user/user.module';
import { PermissionModule } from '../permission/permission.module';
import { AuditModule } from '../audit/audit.module';
import { HashingModule } from '../common/hashing/hashing.module';
import { JwtAuthGuard } from '../common/guards/jwt-auth.guard';
import { parseExpiresInToSeconds } from '../common/utils/duration.util';

@Module({
  imports: [
    TypeOrmModule.forFeature([RefreshToken]),
    UserModule,
    PermissionModule,
    AuditModule,
    HashingModule,
    PassportModule, // 注册 Passport 模块
    // JwtModule 只服务于 Access Token；Refresh Token 不是 JWT
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        secret: configService.getOrThrow<string>('jwt.secret'),
        signOptions: {
          algorithm: 'HS256',
          issuer: configService.getOrThrow<string>('jwt.issuer'),
          expiresIn: parseExpiresInToSeconds(configService.get<string>('jwt.accessExpiresIn') ?? '15m'),
        },
        verifyOptions: {
          algorithms: ['HS256'],
          issuer: configService.getOrThrow<string>('jwt.issuer'),
        },
      }),
    }),
  ],
  providers: [
    AuthService,
    AccessTokenService,
    RefreshTokenService,
    {
      provide: REFRESH_TOKEN_STORE,
      useClass: TypeOrmRefreshTokenStore,
    },
    JwtStrategy,
    {
      provide: APP_GUARD, // 注册全局 Guard
      useClass: JwtAuthGuard,
    },
  ],
  controllers: [AuthController],
})
export class AuthModule {}
