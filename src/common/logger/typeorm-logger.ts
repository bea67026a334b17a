import { Logger as NestLogger } from '@nestjs/common';
import { Logger as ITypeOrmLogger } from 'typeorm';

/**
 * TypeORM 日志适配器
 *
 * 将 TypeORM 的原生输出桥接到 Nest Logger (即 Winston)，SQL 与业务日志落在同一批文件中。
 * 参数中可能包含令牌摘要、密码哈希，因此只在 debug 级别打印参数。
 */
export class TypeOrmLogger implements ITypeOrmLogger {
  private readonly logger = new NestLogger('TypeORM');

  logQuery(query: string, parameters?: unknown[]) {
    this.logger.debug(`${query}${this.formatParameters(parameters)}`);
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[]) {
    const message = error instanceof Error ? error.message : error;
    // 失败语句不带参数，避免敏感值进入 error 日志
    this.logger.error(`${query} -- ERROR: ${message}`);
    this.logger.debug(`failed query parameters:${this.formatParameters(parameters)}`);
  }

  logQuerySlow(time: number, query: string) {
    this.logger.warn(`Time: ${time}ms -- ${query}`);
  }

  logSchemaBuild(message: string) {
    this.logger.log(message);
  }

  logMigration(message: string) {
    this.logger.log(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown) {
    const text = typeof message === 'string' ? message : JSON.stringify(message);
    if (level === 'warn') {
      this.logger.warn(text);
      return;
    }
    this.logger.log(text);
  }

  private formatParameters(parameters?: unknown[]): string {
    return parameters && parameters.length ? ` -- PARAMETERS: ${JSON.stringify(parameters)}` : '';
  }
}
