/**
 * 配置文件统一导出
 *
 * 使用 registerAs 创建的命名空间配置，
 * 通过 ConfigModule.forRoot({ load: [...] }) 加载
 */
import appConfig from './app.config';
import databaseConfig from './database.config';
import jwtConfig from './jwt.config';
import loggerConfig from './logger.config';
import tenantConfig from './tenant.config';

export {
  appConfig,
  databaseConfig,
  jwtConfig,
  loggerConfig,
  tenantConfig,
};

// 所有配置的聚合数组，用于 ConfigModule.forRoot({ load: [...] })
export const configurations = [
  appConfig,
  databaseConfig,
  jwtConfig,
  loggerConfig,
  tenantConfig,
];
