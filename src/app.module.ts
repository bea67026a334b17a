import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigService, ConfigType } from '@nestjs/config';
import { AppConfigModule } from './common/configs/app-config.module';
import { databaseConfig } from './common/configs/config';
import { LoggerModule } from './common/logger/logger.module';
import { TypeOrmLogger } from './common/logger/typeorm-logger';
import { HealthModule } from './common/health/health.module';
import { AuditModule } from './audit/audit.module';
import { PermissionModule } from './permission/permission.module';
import { RoleModule } from './role/role.module';
import { UserModule } from './user/user.module';
import { AuthModule } from './auth/auth.module';
import { IdentitySchema1760000000000 } from './database/migrations/1760000000000-IdentitySchema';

@Module({
  imports: [
    AppConfigModule, // 全局配置模块，一旦导入，所有其他模块都能直接用 ConfigService
    LoggerModule,    // 全局日志模块
    // 数据库连接配置
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const dbConfig = configService.getOrThrow<ConfigType<typeof databaseConfig>>('database');
        return {
          type: 'postgres',
          host: dbConfig.host,
          port: dbConfig.port,
          username: dbConfig.user,
          password: dbConfig.pass,
          database: dbConfig.name,
          autoLoadEntities: true, // 自动加载通过 forFeature 注册的实体，无需手动配置 entities 路径
          synchronize: dbConfig.synchronize, // 表结构以迁移为准，仅本地开发时打开
          migrations: [IdentitySchema1760000000000],
          migrationsRun: dbConfig.migrationsRun,
          logging: dbConfig.logging,
          logger: new TypeOrmLogger(), // SQL 日志交给 Winston
        };
      },
    }),
    HealthModule,
    AuditModule,
    PermissionModule,
    RoleModule,
    UserModule,
    AuthModule,
  ],
})
export class AppModule {}
