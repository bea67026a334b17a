import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, IsNull, MoreThan, Repository } from 'typeorm';
import { RefreshToken } from './entities/refresh-token.entity';
import { IRefreshTokenStore, NewRefreshToken } from './refresh-token-store.interface';

/**
 * 基于 PostgreSQL 的 Refresh Token 存储
 *
 * 轮换与撤销都依赖条件更新：
 *   UPDATE refresh_tokens SET revoked_at = now, ...
 *   WHERE id = :id AND revoked_at IS NULL AND expires_at > now
 * 同一令牌的并发请求中只有一个能得到 affected = 1。
 */
@Injectable()
export class TypeOrmRefreshTokenStore implements IRefreshTokenStore {
  constructor(
    @InjectRepository(RefreshToken)
    private readonly refreshTokenRepository: Repository<RefreshToken>,
  ) {}

  async transaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.refreshTokenRepository.manager.transaction(work);
  }

  async create(token: NewRefreshToken, manager: EntityManager): Promise<RefreshToken> {
    const repository = manager.getRepository(RefreshToken);
    return repository.save(repository.create({ ...token, revokedAt: null, replacedBy: null }));
  }

  async findByHash(tokenHash: string): Promise<RefreshToken | null> {
    return this.refreshTokenRepository.findOneBy({ tokenHash });
  }

  async rotate(
    currentId: string,
    replacement: NewRefreshToken,
    now: Date,
    manager: EntityManager,
  ): Promise<RefreshToken | null> {
    const result = await manager.getRepository(RefreshToken).update(
      { id: currentId, revokedAt: IsNull(), expiresAt: MoreThan(now) },
      { revokedAt: now, replacedBy: replacement.id },
    );
    if (result.affected !== 1) {
      return null;
    }
    return this.create(replacement, manager);
  }

  async revoke(currentId: string, now: Date, manager: EntityManager): Promise<boolean> {
    const result = await manager.getRepository(RefreshToken).update(
      { id: currentId, revokedAt: IsNull(), expiresAt: MoreThan(now) },
      { revokedAt: now },
    );
    return result.affected === 1;
  }
}
