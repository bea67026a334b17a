import 'reflect-metadata';
import { NestFactory, Reflector } from '@nestjs/core';
import { ClassSerializerInterceptor, Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // 使用 Winston 替换 Nest 默认日志，启动阶段的日志先缓冲再输出
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  // 注册全局异常过滤器
  app.useGlobalFilters(new HttpExceptionFilter());

  // 开启全局参数校验管道
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true, // 自动剔除 DTO 中未定义的属性 (防止恶意字段注入)
    transform: true, // 自动转换参数类型
  }));

  // 响应 DTO 通过 @Exclude/@Expose 控制输出字段
  app.useGlobalInterceptors(new ClassSerializerInterceptor(app.get(Reflector)));

  const port = app.get(ConfigService).getOrThrow<number>('app.port');
  await app.listen(port);
}
bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start application', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
