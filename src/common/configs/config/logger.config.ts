import { registerAs } from '@nestjs/config';

/**
 * 日志配置
 *
 * 环境变量 (可选覆盖):
 * - LOG_LEVEL: 日志级别 (error | warn | info | http | verbose | debug | silly)
 * - LOG_ON_CONSOLE: 是否在控制台输出日志
 * - LOG_DIR: 轮转日志文件目录 (默认 logs)
 *
 * 生产环境默认 warn 级别且关闭控制台；其余环境 info 级别、输出到控制台
 */
export default registerAs('logger', () => {
  const isProduction = process.env.APP_ENV === 'production';

  return {
    level: process.env.LOG_LEVEL || (isProduction ? 'warn' : 'info'),

    onConsole: process.env.LOG_ON_CONSOLE !== undefined
      ? process.env.LOG_ON_CONSOLE === 'true'
      : !isProduction,

    dir: process.env.LOG_DIR || 'logs',
  };
});
