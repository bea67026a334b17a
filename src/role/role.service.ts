import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { ArrayContains, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Role } from './entities/role.entity';
import { RolePermission } from './entities/role-permission.entity';
import { User } from '../user/entities/user.entity';
import { AuditLogService, auditActor } from '../audit/audit-log.service';
import { AUDIT_ACTION, AUDIT_RESOURCE, AuditAction } from '../audit/audit.constants';
import { RequestContext } from '../common/security/request-context';
import { assertVisible, resolveOrganizationId, resolveScope } from '../common/security/tenant-scope';
import { trimToUndefined } from '../common/utils/text.util';

export interface RoleInput {
  organizationId?: string;
  name: string;
  roleCode: string;
  description?: string;
}

@Injectable()
export class RoleService {
  private readonly logger = new Logger(RoleService.name);

  constructor(
    @InjectRepository(Role)
    private readonly roleRepository: Repository<Role>,
    @InjectRepository(RolePermission)
    private readonly rolePermissionRepository: Repository<RolePermission>,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly auditLogService: AuditLogService,
    private readonly configService: ConfigService,
  ) {}

  async list(ctx: RequestContext, requestedOrgId?: string): Promise<Role[]> {
    const scopedOrgId = resolveScope(requestedOrgId, ctx);
    const where: FindOptionsWhere<Role> = {};
    if (scopedOrgId !== null) {
      where.orgId = scopedOrgId;
    }
    return this.roleRepository.find({ where, order: { roleCode: 'ASC' } });
  }

  async get(ctx: RequestContext, id: string): Promise<Role> {
    const role = await this.roleRepository.findOneBy({ id });
    if (!role) {
      throw new NotFoundException('Role not found');
    }
    assertVisible(role.orgId, ctx, 'Role not found');
    return role;
  }

  async create(ctx: RequestContext, input: RoleInput): Promise<Role> {
    const orgId = resolveOrganizationId(input.organizationId, ctx, { strict: this.strictWrites() });
    const name = input.name.trim();
    const roleCode = input.roleCode.trim();

    await this.ensureUnique(orgId, roleCode, name, null);

    const role = this.roleRepository.create({
      orgId,
      name,
      roleCode,
      description: trimToUndefined(input.description) ?? null,
    });

    return this.roleRepository.manager.transaction(async (manager) => {
      const saved = await manager.getRepository(Role).save(role);
      await this.audit(ctx, AUDIT_ACTION.CREATE, saved.id, manager);
      this.logger.log(`Role ${roleCode} created in ${orgId}`);
      return saved;
    });
  }

  /**
   * 更新角色
   * roleCode 变化时同步改写持有该角色的用户的 roleCodes，保持 roleIds/roleCodes 一致
   */
  async update(ctx: RequestContext, id: string, input: RoleInput): Promise<Role> {
    const role = await this.get(ctx, id);
    const orgId = resolveOrganizationId(input.organizationId ?? role.orgId, ctx, { strict: this.strictWrites() });
    if (orgId !== role.orgId) {
      throw new BadRequestException('organization_id cannot be changed for roles');
    }

    const name = input.name.trim();
    const roleCode = input.roleCode.trim();
    await this.ensureUnique(orgId, roleCode, name, role.id);

    const previousCode = role.roleCode;
    role.name = name;
    role.roleCode = roleCode;
    if (input.description !== undefined) {
      role.description = trimToUndefined(input.description) ?? null;
    }

    return this.roleRepository.manager.transaction(async (manager) => {
      const saved = await manager.getRepository(Role).save(role);
      if (previousCode !== roleCode) {
        await this.renameRoleCodeOnUsers(role.id, previousCode, roleCode, manager);
      }
      await this.audit(ctx, AUDIT_ACTION.UPDATE, saved.id, manager);
      return saved;
    });
  }

  /**
   * 物理删除，仍被权限映射或用户引用时拒绝
   */
  async delete(ctx: RequestContext, id: string): Promise<void> {
    const role = await this.get(ctx, id);

    const assignedPermissions = await this.rolePermissionRepository.countBy({ roleId: role.id });
    if (assignedPermissions > 0) {
      throw new ConflictException('Role has assigned permissions');
    }
    const assignedUsers = await this.userRepository.countBy({ roleIds: ArrayContains([role.id]) });
    if (assignedUsers > 0) {
      throw new ConflictException('Role is assigned to users');
    }

    await this.roleRepository.manager.transaction(async (manager) => {
      await manager.getRepository(Role).delete({ id: role.id });
      await this.audit(ctx, AUDIT_ACTION.DELETE, role.id, manager);
    });
    this.logger.log(`Role ${role.roleCode} deleted from ${role.orgId}`);
  }

  private async renameRoleCodeOnUsers(
    roleId: string,
    previousCode: string,
    roleCode: string,
    manager: EntityManager,
  ): Promise<void> {
    const userRepository = manager.getRepository(User);
    const users = await userRepository.find({ where: { roleIds: ArrayContains([roleId]) } });
    for (const user of users) {
      user.roleCodes = user.roleCodes.map((code) => (code === previousCode ? roleCode : code));
      await userRepository.save(user);
    }
  }

  private async ensureUnique(orgId: string, roleCode: string, name: string, excludeId: string | null): Promise<void> {
    const byCode = await this.roleRepository.findOneBy({ orgId, roleCode });
    if (byCode && byCode.id !== excludeId) {
      throw new ConflictException('Role code already exists');
    }
    const byName = await this.roleRepository.findOneBy({ orgId, name });
    if (byName && byName.id !== excludeId) {
      throw new ConflictException('Role name already exists');
    }
  }

  private async audit(ctx: RequestContext, action: AuditAction, roleId: string, manager: EntityManager) {
    await this.auditLogService.record(
      { ...auditActor(ctx), action, resource: AUDIT_RESOURCE.ROLES, targetIds: [roleId] },
      manager,
    );
  }

  private strictWrites(): boolean {
    return this.configService.get<boolean>('tenant.strictWrites') ?? false;
  }
}
