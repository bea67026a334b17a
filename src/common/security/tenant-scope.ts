import { BadRequestException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { isBlank } from '../utils/text.util';

/**
 * 租户边界判定所需的调用方信息
 */
export interface TenantActor {
  readonly organizationId: string | null;
  readonly superAdmin: boolean;
}

export interface ResolveOrganizationOptions {
  /**
   * 为 true 时，非超级管理员提交了不属于自己的机构 ID 直接拒绝 (403)，
   * 否则静默替换为调用方所属机构
   */
  strict?: boolean;
}

function requireActorOrganization(actor: TenantActor): string {
  if (isBlank(actor.organizationId)) {
    throw new BadRequestException('organization_id is required for tenant scope');
  }
  return actor.organizationId;
}

/**
 * 读操作的机构范围
 *
 * - 超级管理员：原样返回请求值，空值表示不限机构 (null)
 * - 其他调用方：永远返回其所属机构，忽略请求值
 *
 * 这是阻止租户通过查询参数读取其他机构数据的唯一关口
 */
export function resolveScope(requestedOrgId: string | null | undefined, actor: TenantActor): string | null {
  if (actor.superAdmin) {
    return isBlank(requestedOrgId) ? null : requestedOrgId.trim();
  }
  return requireActorOrganization(actor);
}

/**
 * 写操作的目标机构
 *
 * - 超级管理员必须显式指定目标机构
 * - 其他调用方始终写入自己所属的机构
 */
export function resolveOrganizationId(
  requestOrgId: string | null | undefined,
  actor: TenantActor,
  options: ResolveOrganizationOptions = {},
): string {
  if (actor.superAdmin) {
    if (isBlank(requestOrgId)) {
      throw new BadRequestException('organization_id is required');
    }
    return requestOrgId.trim();
  }

  const current = requireActorOrganization(actor);
  if (options.strict && !isBlank(requestOrgId) && requestOrgId.trim() !== current) {
    throw new ForbiddenException('organization_id does not match current tenant');
  }
  return current;
}

/**
 * 单条记录的可见性检查
 * 跨租户访问统一返回 404，不暴露其他机构记录是否存在
 */
export function assertVisible(recordOrgId: string, actor: TenantActor, notFoundMessage: string): void {
  const scope = resolveScope(null, actor);
  if (scope !== null && scope !== recordOrgId) {
    throw new NotFoundException(notFoundMessage);
  }
}
