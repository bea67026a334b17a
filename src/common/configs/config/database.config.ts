import { registerAs } from '@nestjs/config';

/**
 * 数据库配置 (PostgreSQL)
 *
 * 连接信息：DB_HOST, DB_PORT, DB_NAME, DB_USER, DB_PASS
 * DB_MIGRATIONS_RUN 为 true 时启动即执行未应用的身份表迁移 (单实例部署使用；多实例请走 migration:run)
 */
export default registerAs('database', () => {
  const isProduction = process.env.APP_ENV === 'production';
  return {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    name: process.env.DB_NAME,
    user: process.env.DB_USER,
    pass: process.env.DB_PASS,

    // 生产环境表结构只由迁移维护
    synchronize: !isProduction && process.env.DB_SYNCHRONIZE === 'true',
    migrationsRun: process.env.DB_MIGRATIONS_RUN === 'true',
    logging: process.env.DB_LOGGING === 'true',
  };
});
