import { Injectable } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';

/**
 * 单向哈希原语 (密码)
 *
 * 使用 bcryptjs 的异步 API：计算按轮次让出事件循环，单次哈希不会长时间阻塞其他请求。
 * 身份核心只依赖 hash / compare 两个操作，算法可整体替换。
 */
@Injectable()
export class HashingService {
  private readonly saltRounds = 10;

  async hash(plainText: string): Promise<string> {
    return bcrypt.hash(plainText, this.saltRounds);
  }

  /**
   * 比对明文与哈希
   * 哈希缺失 (例如仅由管理员导入、尚未设置密码的账号) 时视为不匹配
   */
  async compare(plainText: string, hash: string | null | undefined): Promise<boolean> {
    if (!hash) {
      return false;
    }
    return bcrypt.compare(plainText, hash);
  }
}
