import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { Role } from './entities/role.entity';
import { RolePermission } from './entities/role-permission.entity';
import { Permission } from '../permission/entities/permission.entity';
import { RoleService } from './role.service';
import { AuditLogService, auditActor } from '../audit/audit-log.service';
import { AUDIT_ACTION, AUDIT_RESOURCE } from '../audit/audit.constants';
import { RequestContext } from '../common/security/request-context';
import { uniqueValues } from '../common/utils/text.util';

/**
 * 角色-权限分配
 *
 * 校验失败一律返回 404 而不是 403：
 * 不让调用方通过错误码判断其他机构或 system 作用域的权限是否存在。
 */
@Injectable()
export class RolePermissionService {
  constructor(
    @InjectRepository(RolePermission)
    private readonly rolePermissionRepository: Repository<RolePermission>,
    @InjectRepository(Permission)
    private readonly permissionRepository: Repository<Permission>,
    private readonly roleService: RoleService,
    private readonly auditLogService: AuditLogService,
  ) {}

  async listPermissions(ctx: RequestContext, roleId: string): Promise<Permission[]> {
    const role = await this.roleService.get(ctx, roleId);
    return this.loadAssigned(ctx, role.id);
  }

  /**
   * 全量替换：先删除该角色全部映射，再写入去重后的集合
   */
  async replacePermissions(ctx: RequestContext, roleId: string, permissionIds: readonly string[]): Promise<Permission[]> {
    const role = await this.roleService.get(ctx, roleId);
    const ids = uniqueValues(permissionIds);
    await this.validatePermissions(ctx, role, ids);

    await this.rolePermissionRepository.manager.transaction(async (manager) => {
      const repository = manager.getRepository(RolePermission);
      await repository.delete({ roleId: role.id });
      await this.insertMappings(role, ids, manager);
      await this.audit(ctx, role.id, ids, manager);
    });

    return this.loadAssigned(ctx, role.id);
  }

  /**
   * 追加：已分配的权限 ID 跳过
   */
  async addPermissions(ctx: RequestContext, roleId: string, permissionIds: readonly string[]): Promise<Permission[]> {
    const role = await this.roleService.get(ctx, roleId);
    const ids = uniqueValues(permissionIds);
    await this.validatePermissions(ctx, role, ids);

    const existing = await this.rolePermissionRepository.findBy({ roleId: role.id });
    const assigned = new Set(existing.map((mapping) => mapping.permissionId));
    const toInsert = ids.filter((id) => !assigned.has(id));

    await this.rolePermissionRepository.manager.transaction(async (manager) => {
      await this.insertMappings(role, toInsert, manager);
      await this.audit(ctx, role.id, ids, manager);
    });

    return this.loadAssigned(ctx, role.id);
  }

  async removePermission(ctx: RequestContext, roleId: string, permissionId: string): Promise<void> {
    const role = await this.roleService.get(ctx, roleId);
    const mapping = await this.rolePermissionRepository.findOneBy({ roleId: role.id, permissionId });
    if (!mapping) {
      throw new NotFoundException('Permission not assigned to role');
    }
    if (!ctx.superAdmin) {
      const permission = await this.permissionRepository.findOneBy({ id: permissionId });
      if (permission?.scope === 'system') {
        throw new NotFoundException('Permission not assigned to role');
      }
    }

    await this.rolePermissionRepository.manager.transaction(async (manager) => {
      await manager.getRepository(RolePermission).delete({ id: mapping.id });
      await this.audit(ctx, role.id, [permissionId], manager);
    });
  }

  private async loadAssigned(ctx: RequestContext, roleId: string): Promise<Permission[]> {
    const mappings = await this.rolePermissionRepository.findBy({ roleId });
    const permissionIds = uniqueValues(mappings.map((mapping) => mapping.permissionId));
    if (!permissionIds.length) {
      return [];
    }
    const permissions = await this.permissionRepository.findBy({ id: In(permissionIds) });
    return permissions
      .filter((permission) => ctx.superAdmin || permission.scope !== 'system')
      .sort((a, b) => a.permissionCode.localeCompare(b.permissionCode));
  }

  private async validatePermissions(ctx: RequestContext, role: Role, permissionIds: string[]): Promise<void> {
    if (!permissionIds.length) {
      return;
    }
    const permissions = await this.permissionRepository.findBy({ id: In(permissionIds) });
    const visible = permissions.filter((permission) => ctx.superAdmin || permission.scope !== 'system');
    if (visible.length !== permissionIds.length) {
      throw new NotFoundException('One or more permissions not found');
    }
    if (visible.some((permission) => permission.orgId !== role.orgId)) {
      throw new NotFoundException('Permission organization mismatch');
    }
  }

  private async insertMappings(role: Role, permissionIds: string[], manager: EntityManager): Promise<void> {
    if (!permissionIds.length) {
      return;
    }
    const repository = manager.getRepository(RolePermission);
    const mappings = permissionIds.map((permissionId) =>
      repository.create({ orgId: role.orgId, roleId: role.id, permissionId }),
    );
    await repository.save(mappings);
  }

  private async audit(ctx: RequestContext, roleId: string, permissionIds: string[], manager: EntityManager) {
    await this.auditLogService.record(
      {
        ...auditActor(ctx),
        action: AUDIT_ACTION.UPDATE,
        resource: AUDIT_RESOURCE.ROLES,
        targetIds: [roleId, ...permissionIds],
      },
      manager,
    );
  }
}
