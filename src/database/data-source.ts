import 'dotenv/config';
import { DataSource, DataSourceOptions } from 'typeorm';

/**
 * TypeORM CLI 专用数据源
 * 供 npm run migration:run / migration:revert 使用，直接读取 .env，
 * 与 AppModule 中 TypeOrmModule.forRootAsync 的连接参数保持一致
 */

const options: DataSourceOptions = {
  type: 'postgres',
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASS || '',
  database: process.env.DB_NAME || 'clinic_identity',

  // 实体路径：CLI 运行时需要编译后的 JS 文件 (tsconfig.build.json 以 src 为根输出到 dist/)
  entities: ['dist/**/*.entity.js'],

  // 迁移文件路径
  migrations: ['dist/database/migrations/*.js'],

  // 禁用自动同步，使用迁移管理数据库结构
  synchronize: false,

  // 开发环境开启日志，便于调试 SQL
  logging: process.env.DB_LOGGING === 'true',
};

// 导出 DataSource 实例供 TypeORM CLI 使用
export const AppDataSource = new DataSource(options);
