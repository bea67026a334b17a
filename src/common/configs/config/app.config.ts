import { registerAs } from '@nestjs/config';

/**
 * 应用基础配置
 *
 * 环境变量：
 * - APP_ENV: 运行环境 (development | production | test)
 * - APP_PORT: 服务端口
 */
export default registerAs('app', () => ({
  // 服务名，同时作为控制台日志的前缀
  name: 'ClinicIdentity',

  env: process.env.APP_ENV || 'development',

  port: parseInt(process.env.APP_PORT || '3000', 10),

  isProduction: process.env.APP_ENV === 'production',
}));
