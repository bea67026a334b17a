import { Module } from '@nestjs/common';
import { HashingService } from './hashing.service';

/**
 * 密码哈希共享模块，被 AuthModule 与 UserModule 导入
 */
@Module({
  providers: [HashingService],
  exports: [HashingService],
})
export class HashingModule {}
