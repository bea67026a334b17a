import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Permission, PERMISSION_SCOPES, PermissionScope } from './entities/permission.entity';
import { RolePermission } from '../role/entities/role-permission.entity';
import { AuditLogService, auditActor } from '../audit/audit-log.service';
import { AUDIT_ACTION, AUDIT_RESOURCE, AuditAction } from '../audit/audit.constants';
import { RequestContext } from '../common/security/request-context';
import { assertVisible, resolveOrganizationId, resolveScope } from '../common/security/tenant-scope';
import { isBlank, trimToUndefined } from '../common/utils/text.util';

/**
 * resource 为 system 的权限强制归入 system 作用域
 */
export const SYSTEM_RESOURCE = 'system';

export interface PermissionListFilters {
  organizationId?: string;
  active?: boolean;
  resource?: string;
  action?: string;
  includeSystem?: boolean;
}

export interface PermissionInput {
  organizationId?: string;
  name: string;
  resource: string;
  action: string;
  scope?: string;
  description?: string;
  active?: boolean;
}

/**
 * 规范权限码：去除首尾空白后以 "." 连接
 */
export function buildPermissionCode(resource: string, action: string): string {
  return `${resource.trim()}.${action.trim()}`;
}

function isPermissionScope(value: string): value is PermissionScope {
  return PERMISSION_SCOPES.some((scope) => scope === value);
}

/**
 * 作用域归一
 *
 * 1. 未指定时沿用已有值，新建默认 tenant
 * 2. resource=system 一律强制为 system
 * 3. system 作用域只允许超级管理员写入
 */
export function normalizeScope(
  requested: string | null | undefined,
  resource: string,
  current: PermissionScope | null,
  superAdmin: boolean,
): PermissionScope {
  let scope = isBlank(requested) ? (current ?? 'tenant') : requested.trim().toLowerCase();
  if (resource.trim().toLowerCase() === SYSTEM_RESOURCE) {
    scope = 'system';
  }
  if (!isPermissionScope(scope)) {
    throw new BadRequestException('Invalid permission scope');
  }
  if (scope === 'system' && !superAdmin) {
    throw new ForbiddenException('system scope requires super admin');
  }
  return scope;
}

/**
 * 权限目录管理
 *
 * 停用权限时同一事务内删除全部角色关联，
 * 解析侧 (PermissionResolverService) 仍会在读取时再次过滤 active。
 */
@Injectable()
export class PermissionService {
  private readonly logger = new Logger(PermissionService.name);

  constructor(
    @InjectRepository(Permission)
    private readonly permissionRepository: Repository<Permission>,
    private readonly auditLogService: AuditLogService,
    private readonly configService: ConfigService,
  ) {}

  async list(ctx: RequestContext, filters: PermissionListFilters): Promise<Permission[]> {
    const scopedOrgId = resolveScope(filters.organizationId, ctx);
    const allowSystem = ctx.superAdmin && filters.includeSystem === true;
    const resource = trimToUndefined(filters.resource);
    const action = trimToUndefined(filters.action);

    // 非超级管理员按 resource=system 查询时直接返回空，不触达数据库
    if (!allowSystem && resource?.toLowerCase() === SYSTEM_RESOURCE) {
      return [];
    }

    const where: FindOptionsWhere<Permission> = {};
    if (scopedOrgId !== null) {
      where.orgId = scopedOrgId;
    }
    if (!allowSystem) {
      where.scope = 'tenant';
    }
    if (filters.active !== undefined) {
      where.active = filters.active;
    }
    if (resource) {
      where.resource = resource;
    }
    if (action) {
      where.action = action;
    }

    return this.permissionRepository.find({ where, order: { permissionCode: 'ASC' } });
  }

  async get(ctx: RequestContext, id: string): Promise<Permission> {
    const permission = await this.permissionRepository.findOneBy({ id });
    if (!permission) {
      throw new NotFoundException('Permission not found');
    }
    if (permission.scope === 'system' && !ctx.superAdmin) {
      throw new NotFoundException('Permission not found');
    }
    assertVisible(permission.orgId, ctx, 'Permission not found');
    return permission;
  }

  async create(ctx: RequestContext, input: PermissionInput): Promise<Permission> {
    const orgId = resolveOrganizationId(input.organizationId, ctx, { strict: this.strictWrites() });
    const resource = input.resource.trim();
    const action = input.action.trim();
    const permissionCode = buildPermissionCode(resource, action);
    const scope = normalizeScope(input.scope, resource, null, ctx.superAdmin);

    await this.ensureUniqueCode(orgId, permissionCode, null);

    const permission = this.permissionRepository.create({
      orgId,
      name: input.name.trim(),
      permissionCode,
      scope,
      resource,
      action,
      description: trimToUndefined(input.description) ?? null,
      active: input.active ?? true,
    });

    return this.permissionRepository.manager.transaction(async (manager) => {
      const saved = await manager.getRepository(Permission).save(permission);
      await this.audit(ctx, AUDIT_ACTION.CREATE, saved.id, manager);
      this.logger.log(`Permission ${permissionCode} created in ${orgId}`);
      return saved;
    });
  }

  async update(ctx: RequestContext, id: string, input: PermissionInput): Promise<Permission> {
    const permission = await this.get(ctx, id);
    const orgId = resolveOrganizationId(input.organizationId ?? permission.orgId, ctx, {
      strict: this.strictWrites(),
    });
    if (orgId !== permission.orgId) {
      throw new BadRequestException('organization_id cannot be changed for permissions');
    }

    const resource = input.resource.trim();
    const action = input.action.trim();
    const permissionCode = buildPermissionCode(resource, action);
    const scope = normalizeScope(input.scope, resource, permission.scope, ctx.superAdmin);

    await this.ensureUniqueCode(orgId, permissionCode, permission.id);

    const deactivating = input.active === false;
    Object.assign(permission, {
      name: input.name.trim(),
      permissionCode,
      scope,
      resource,
      action,
      description: input.description === undefined ? permission.description : (trimToUndefined(input.description) ?? null),
      active: input.active ?? permission.active,
    });

    return this.permissionRepository.manager.transaction(async (manager) => {
      const saved = await manager.getRepository(Permission).save(permission);
      if (deactivating) {
        await this.detachFromRoles(permission.id, manager);
      }
      await this.audit(ctx, AUDIT_ACTION.UPDATE, saved.id, manager);
      return saved;
    });
  }

  /**
   * 停用权限，并清空所有角色对它的引用
   */
  async deactivate(ctx: RequestContext, id: string): Promise<void> {
    const permission = await this.get(ctx, id);

    await this.permissionRepository.manager.transaction(async (manager) => {
      await manager.getRepository(Permission).update({ id: permission.id }, { active: false });
      const detached = await this.detachFromRoles(permission.id, manager);
      await this.audit(ctx, AUDIT_ACTION.DELETE, permission.id, manager);
      this.logger.log(`Permission ${permission.permissionCode} deactivated, ${detached} role mapping(s) removed`);
    });
  }

  private async detachFromRoles(permissionId: string, manager: EntityManager): Promise<number> {
    const result = await manager.getRepository(RolePermission).delete({ permissionId });
    return result.affected ?? 0;
  }

  private async ensureUniqueCode(orgId: string, permissionCode: string, excludeId: string | null): Promise<void> {
    const existing = await this.permissionRepository.findOneBy({ orgId, permissionCode });
    if (existing && existing.id !== excludeId) {
      throw new ConflictException('Permission already exists');
    }
  }

  private async audit(ctx: RequestContext, action: AuditAction, permissionId: string, manager: EntityManager) {
    await this.auditLogService.record(
      { ...auditActor(ctx), action, resource: AUDIT_RESOURCE.PERMISSIONS, targetIds: [permissionId] },
      manager,
    );
  }

  private strictWrites(): boolean {
    return this.configService.get<boolean>('tenant.strictWrites') ?? false;
  }
}
