import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, randomBytes, randomUUID } from 'crypto';
import { EntityManager } from 'typeorm';
import { RefreshToken } from './entities/refresh-token.entity';
import { IRefreshTokenStore, NewRefreshToken, REFRESH_TOKEN_STORE } from './refresh-token-store.interface';
import { AuditEntry, AuditLogService } from '../../audit/audit-log.service';
import { AUDIT_ACTION, AUDIT_RESOURCE, AuditAction } from '../../audit/audit.constants';
import { ClientMeta } from '../../common/security/request-context';
import { parseExpiresInToSeconds } from '../../common/utils/duration.util';
import { isBlank } from '../../common/utils/text.util';

interface GeneratedToken {
  raw: string;
  record: NewRefreshToken;
}

/**
 * Refresh Token 生命周期：issued → rotated | revoked | expired (均为终态)
 *
 * 令牌是不透明随机串而非 JWT，服务端只保存 SHA-256 摘要，
 * 被轮换或撤销的令牌再次出现时一律返回 401。
 */
@Injectable()
export class RefreshTokenService {
  private readonly logger = new Logger(RefreshTokenService.name);

  constructor(
    @Inject(REFRESH_TOKEN_STORE)
    private readonly store: IRefreshTokenStore,
    private readonly auditLogService: AuditLogService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * 签发新令牌，返回原文 (只此一次)
   * additionalAudit 中的记录与令牌写入同事务提交，例如登录审计
   */
  async issue(
    userId: string,
    client: ClientMeta,
    actorUserId: string,
    additionalAudit: readonly AuditEntry[] = [],
  ): Promise<string> {
    const { raw, record } = this.generate(userId, client, new Date());
    await this.store.transaction(async (manager) => {
      const saved = await this.store.create(record, manager);
      await this.audit(AUDIT_ACTION.CREATE, saved.id, actorUserId, client, manager);
      for (const entry of additionalAudit) {
        await this.auditLogService.record(entry, manager);
      }
    });
    return raw;
  }

  /**
   * 轮换：撤销当前令牌并签发替代令牌
   * 条件更新、新记录与两条审计在同一事务内；
   * 同一令牌被并发提交时只有一个请求成功，其余返回 401 且不会产生新记录
   */
  async rotate(rawToken: string, client: ClientMeta, actorUserId: string): Promise<string> {
    const current = await this.requireValid(rawToken);
    const now = new Date();
    const { raw, record } = this.generate(current.userId, client, now);

    const replacement = await this.store.transaction(async (manager) => {
      const created = await this.store.rotate(current.id, record, now, manager);
      if (!created) {
        return null;
      }
      await this.audit(AUDIT_ACTION.CREATE, created.id, actorUserId, client, manager);
      await this.audit(AUDIT_ACTION.UPDATE, current.id, actorUserId, client, manager, { replaced_by: created.id });
      return created;
    });
    if (!replacement) {
      this.logger.warn(`Refresh token ${current.id} presented again after rotation`);
      throw new UnauthorizedException('Refresh token already rotated');
    }
    return raw;
  }

  async revoke(rawToken: string, client: ClientMeta, actorUserId: string): Promise<void> {
    const current = await this.requireValid(rawToken);
    const revoked = await this.store.transaction(async (manager) => {
      if (!(await this.store.revoke(current.id, new Date(), manager))) {
        return false;
      }
      await this.audit(AUDIT_ACTION.UPDATE, current.id, actorUserId, client, manager);
      return true;
    });
    if (!revoked) {
      throw new UnauthorizedException('Refresh token revoked');
    }
  }

  async requireValid(rawToken: string | null | undefined): Promise<RefreshToken> {
    if (isBlank(rawToken)) {
      throw new UnauthorizedException('Invalid refresh token');
    }
    const token = await this.store.findByHash(this.hashToken(rawToken.trim()));
    if (!token) {
      throw new UnauthorizedException('Invalid refresh token');
    }
    if (token.revokedAt) {
      throw new UnauthorizedException('Refresh token revoked');
    }
    if (token.expiresAt.getTime() <= Date.now()) {
      throw new UnauthorizedException('Refresh token expired');
    }
    return token;
  }

  hashToken(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }

  refreshTokenTtlSeconds(): number {
    return parseExpiresInToSeconds(this.configService.get<string>('jwt.refreshExpiresIn') ?? '7d');
  }

  private async audit(
    action: AuditAction,
    tokenId: string,
    actorUserId: string,
    client: ClientMeta,
    manager: EntityManager,
    payload?: Record<string, unknown>,
  ): Promise<void> {
    await this.auditLogService.record(
      {
        actorUserId,
        action,
        resource: AUDIT_RESOURCE.REFRESH_TOKENS,
        targetIds: [tokenId],
        payload,
        ipAddress: client.ipAddress,
        userAgent: client.userAgent,
      },
      manager,
    );
  }

  private generate(userId: string, client: ClientMeta, now: Date): GeneratedToken {
    const bytes = this.configService.get<number>('jwt.refreshTokenBytes') ?? 32;
    const raw = randomBytes(bytes).toString('hex');
    return {
      raw,
      record: {
        id: randomUUID(),
        userId,
        tokenHash: this.hashToken(raw),
        expiresAt: new Date(now.getTime() + this.refreshTokenTtlSeconds() * 1000),
        ipAddress: client.ipAddress,
        userAgent: client.userAgent,
      },
    };
  }
}
