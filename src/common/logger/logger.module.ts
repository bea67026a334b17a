import { Module } from '@nestjs/common';
import { ConfigService, ConfigType } from '@nestjs/config';
import { WinstonModule, utilities as nestWinstonModuleUtilities } from 'nest-winston';
import * as winston from 'winston';
import 'winston-daily-rotate-file';
import { appConfig, loggerConfig } from '../configs/config';

@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const app = configService.getOrThrow<ConfigType<typeof appConfig>>('app');
        const logger = configService.getOrThrow<ConfigType<typeof loggerConfig>>('logger');
        const transports: winston.transport[] = [];

        // 1. 控制台输出 (开发环境常用)
        if (logger.onConsole) {
          transports.push(
            new winston.transports.Console({
              format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.ms(),
                nestWinstonModuleUtilities.format.nestLike(app.name, {
                  colors: true,
                  prettyPrint: true,
                }),
              ),
            }),
          );
        }

        const fileFormat = winston.format.combine(
          winston.format.timestamp(),
          winston.format.json(),
        );

        // 2. 文件输出 (按天轮转)，错误日志单独成文件，便于排查登录/令牌异常
        transports.push(
          new winston.transports.DailyRotateFile({
            level: 'error',
            dirname: logger.dir,
            filename: 'error-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
            format: fileFormat,
          }),
        );

        transports.push(
          new winston.transports.DailyRotateFile({
            dirname: logger.dir,
            filename: 'combined-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d',
            format: fileFormat,
          }),
        );

        return {
          // 根级别：低于此级别的日志在分发给 transports 之前就被丢弃
          level: logger.level,
          transports,
        };
      },
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
