import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AuditLog, AuditPayload } from './entities/audit-log.entity';
import { AuditAction, AuditResource } from './audit.constants';
import { RequestContext } from '../common/security/request-context';
import { isBlank } from '../common/utils/text.util';

/**
 * 一条审计记录的输入
 */
export interface AuditEntry {
  actorUserId: string | null | undefined;
  action: AuditAction;
  resource: AuditResource;
  targetIds?: readonly string[];
  /**
   * 额外载荷；其中的 target_ids / ids / id 会被用于推导目标 ID
   */
  payload?: Record<string, unknown>;
  ipAddress?: string | null;
  userAgent?: string | null;
}

/**
 * 从请求上下文中取出操作者与客户端信息
 */
export function auditActor(ctx: RequestContext): Pick<AuditEntry, 'actorUserId' | 'ipAddress' | 'userAgent'> {
  return {
    actorUserId: ctx.actorUserId,
    ipAddress: ctx.ipAddress,
    userAgent: ctx.userAgent,
  };
}

/**
 * 审计写入服务 (fail-closed)
 *
 * 缺少操作者 ID 时直接抛错并向上传播，身份相关的变更不允许在没有可追溯操作者的情况下完成。
 * 调用方传入事务内的 EntityManager 时，审计与业务写入同提交、同回滚。
 */
@Injectable()
export class AuditLogService {
  private readonly logger = new Logger(AuditLogService.name);

  constructor(
    @InjectRepository(AuditLog)
    private readonly auditLogRepository: Repository<AuditLog>,
  ) {}

  async record(entry: AuditEntry, manager?: EntityManager): Promise<AuditLog> {
    const { actorUserId } = entry;
    if (isBlank(actorUserId)) {
      throw new BadRequestException('actor_user_id is required for audit logging');
    }

    const payload: Record<string, unknown> = { ...entry.payload };
    if (entry.targetIds) {
      payload['target_ids'] = [...entry.targetIds];
    }

    const repository = manager ? manager.getRepository(AuditLog) : this.auditLogRepository;
    const log = repository.create({
      userId: actorUserId,
      action: entry.action,
      resource: entry.resource,
      payload: buildAuditPayload(actorUserId, entry.action, entry.resource, payload),
      ipAddress: entry.ipAddress ?? null,
      userAgent: entry.userAgent ?? null,
    });
    const saved = await repository.save(log);

    this.logger.debug(`${entry.action} ${entry.resource} by ${actorUserId} [${saved.payload.target_ids.join(', ')}]`);
    return saved;
  }
}

/**
 * 构造审计载荷
 * target_ids 依次取 target_ids → ids → id；额外字段不会覆盖四个固定字段
 */
export function buildAuditPayload(
  actorUserId: string,
  action: string,
  resource: string,
  payload: Record<string, unknown> | null | undefined,
): AuditPayload {
  const enriched: AuditPayload = {
    actor_user_id: actorUserId,
    action,
    resource,
    target_ids: extractTargetIds(payload),
  };
  for (const [key, value] of Object.entries(payload ?? {})) {
    if (!(key in enriched)) {
      enriched[key] = value;
    }
  }
  return enriched;
}

function extractTargetIds(payload: Record<string, unknown> | null | undefined): string[] {
  if (!payload) {
    return [];
  }
  const targetIds = toStringList(payload['target_ids']);
  if (targetIds.length) {
    return targetIds;
  }
  const ids = toStringList(payload['ids']);
  if (ids.length) {
    return ids;
  }
  const id = payload['id'];
  if (id !== null && id !== undefined) {
    return [String(id)];
  }
  return [];
}

function toStringList(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null && item !== undefined).map((item) => String(item));
  }
  return [];
}
