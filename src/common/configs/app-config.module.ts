import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import * as Joi from 'joi';
import { configurations } from './config';

/**
 * 过期时间格式：数字 + 单位 (s/m/h/d)，例如 15m、7d
 */
const EXPIRES_IN_PATTERN = /^\d+[smhd]$/;

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      // 1. 强校验：启动阶段即拒绝缺失或格式错误的变量
      validationSchema: Joi.object({
        APP_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
        APP_PORT: Joi.number().default(3000),
        // 数据库配置校验
        DB_HOST: Joi.string().required(),
        DB_PORT: Joi.number().default(5432),
        DB_NAME: Joi.string().required(),
        DB_USER: Joi.string().allow('').optional(),
        DB_PASS: Joi.string().allow('').optional(),
        DB_SYNCHRONIZE: Joi.boolean().default(false),
        DB_MIGRATIONS_RUN: Joi.boolean().default(false),
        DB_LOGGING: Joi.boolean().default(false),
        // 令牌配置：HS256 密钥长度不足 32 字节时拒绝启动
        JWT_ISSUER: Joi.string().default('clinic-identity'),
        JWT_SECRET: Joi.string().min(32).required(),
        JWT_ACCESS_EXPIRES_IN: Joi.string().pattern(EXPIRES_IN_PATTERN).default('15m'),
        JWT_REFRESH_EXPIRES_IN: Joi.string().pattern(EXPIRES_IN_PATTERN).default('7d'),
        REFRESH_TOKEN_BYTES: Joi.number().integer().min(16).max(128).default(32),
        // 多租户
        TENANT_STRICT_WRITES: Joi.boolean().default(false),
        // 日志配置
        LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').default('info'),
        LOG_ON_CONSOLE: Joi.boolean().default(true),
        LOG_DIR: Joi.string().default('logs'),
      }),
      // 2. 结构化：按命名空间加载 (app / database / jwt / logger / tenant)
      load: configurations,
    }),
  ],
  exports: [ConfigModule],
})
export class AppConfigModule {}
