import { EntityManager } from 'typeorm';
import { RefreshToken } from './entities/refresh-token.entity';

/**
 * 待写入的 Refresh Token 记录
 */
export interface NewRefreshToken {
  id: string;
  userId: string;
  tokenHash: string;
  expiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
}

/**
 * Refresh Token 持久化抽象
 *
 * 写操作都接收事务内的 EntityManager，调用方把审计记录写进同一个事务：
 * 令牌状态与审计记录同提交、同回滚。
 */
export interface IRefreshTokenStore {
  transaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T>;

  create(token: NewRefreshToken, manager: EntityManager): Promise<RefreshToken>;

  findByHash(tokenHash: string): Promise<RefreshToken | null>;

  /**
   * 原子轮换：仅当旧记录未撤销且未过期时，撤销旧记录并写入新记录
   * @returns 新记录；并发竞争失败 (旧记录已被其他请求撤销) 时返回 null，且不写入任何数据
   */
  rotate(currentId: string, replacement: NewRefreshToken, now: Date, manager: EntityManager): Promise<RefreshToken | null>;

  /**
   * 原子撤销，语义同 rotate 但不写入新记录
   * @returns 是否由本次调用完成撤销
   */
  revoke(currentId: string, now: Date, manager: EntityManager): Promise<boolean>;
}

/**
 * 依赖注入 Token，用于在 NestJS IoC 容器中标识此接口
 */
export const REFRESH_TOKEN_STORE = 'REFRESH_TOKEN_STORE';
