import { BadRequestException, ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { ArrayContains, EntityManager, FindOptionsWhere, In, Repository } from 'typeorm';
import { User, USER_STATUSES, UserStatus } from './entities/user.entity';
import { Role } from '../role/entities/role.entity';
import { HashingService } from '../common/hashing/hashing.service';
import { PermissionResolverService } from '../permission/permission-resolver.service';
import { AuditLogService, auditActor } from '../audit/audit-log.service';
import { AUDIT_ACTION, AUDIT_RESOURCE, AuditAction } from '../audit/audit.constants';
import { RequestContext } from '../common/security/request-context';
import { assertVisible, resolveOrganizationId, resolveScope } from '../common/security/tenant-scope';
import { isBlank, trimToUndefined, uniqueValues } from '../common/utils/text.util';

export interface UserListFilters {
  organizationId?: string;
  status?: string;
  roleCode?: string;
}

export interface RoleSelection {
  roleIds?: readonly string[];
  roleCodes?: readonly string[];
}

export interface CreateUserInput extends RoleSelection {
  organizationId?: string;
  fullName: string;
  email?: string;
  phone?: string;
  password?: string;
  status?: string;
}

export interface UpdateUserInput {
  organizationId?: string;
  fullName?: string;
  email?: string;
  phone?: string;
  password?: string;
}

interface ResolvedRoles {
  roleIds: string[];
  roleCodes: string[];
}

function isUserStatus(value: string): value is UserStatus {
  return USER_STATUSES.some((status) => status === value);
}

/**
 * 状态归一：空值取默认值，大小写不敏感，只接受 active / inactive
 */
export function normalizeStatus(value: string | null | undefined, fallback: UserStatus = 'active'): UserStatus {
  if (isBlank(value)) {
    return fallback;
  }
  const status = value.trim().toLowerCase();
  if (!isUserStatus(status)) {
    throw new BadRequestException('Invalid status');
  }
  return status;
}

export function normalizeEmail(email: string | null | undefined): string | null {
  return trimToUndefined(email)?.toLowerCase() ?? null;
}

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    @InjectRepository(Role)
    private readonly roleRepository: Repository<Role>,
    private readonly hashingService: HashingService,
    private readonly permissionResolver: PermissionResolverService,
    private readonly auditLogService: AuditLogService,
    private readonly configService: ConfigService,
  ) {}

  async list(ctx: RequestContext, filters: UserListFilters): Promise<User[]> {
    const scopedOrgId = resolveScope(filters.organizationId, ctx);
    const where: FindOptionsWhere<User> = {};
    if (scopedOrgId !== null) {
      where.orgId = scopedOrgId;
    }
    if (!isBlank(filters.status)) {
      where.status = normalizeStatus(filters.status);
    }
    const roleCode = trimToUndefined(filters.roleCode);
    if (roleCode) {
      where.roleCodes = ArrayContains([roleCode]);
    }
    return this.userRepository.find({ where, order: { fullName: 'ASC' } });
  }

  async get(ctx: RequestContext, id: string): Promise<User> {
    const user = await this.userRepository.findOneBy({ id });
    if (!user) {
      throw new NotFoundException('User not found');
    }
    assertVisible(user.orgId, ctx, 'User not found');
    return user;
  }

  async create(ctx: RequestContext, input: CreateUserInput): Promise<User> {
    const orgId = resolveOrganizationId(input.organizationId, ctx, { strict: this.strictWrites() });
    const email = normalizeEmail(input.email);
    const phone = trimToUndefined(input.phone) ?? null;
    if (email === null && phone === null) {
      throw new BadRequestException('Email or phone is required');
    }
    await this.ensureContactUnique(email, phone, null);

    const status = normalizeStatus(input.status);
    const roles = await this.resolveRoles(orgId, input);
    const passwordHash = isBlank(input.password) ? null : await this.hashingService.hash(input.password);

    const user = this.userRepository.create({
      orgId,
      fullName: input.fullName.trim(),
      email,
      phone,
      passwordHash,
      status,
      roleIds: roles.roleIds,
      roleCodes: roles.roleCodes,
    });

    return this.userRepository.manager.transaction(async (manager) => {
      const saved = await manager.getRepository(User).save(user);
      await this.audit(ctx, AUDIT_ACTION.CREATE, saved.id, manager);
      this.logger.log(`User ${saved.id} created in ${orgId}`);
      return saved;
    });
  }

  async update(ctx: RequestContext, id: string, input: UpdateUserInput): Promise<User> {
    const user = await this.get(ctx, id);
    const orgId = resolveOrganizationId(input.organizationId ?? user.orgId, ctx, { strict: this.strictWrites() });
    if (orgId !== user.orgId) {
      throw new BadRequestException('organization_id cannot be changed for users');
    }

    const email = input.email === undefined ? user.email : normalizeEmail(input.email);
    const phone = input.phone === undefined ? user.phone : (trimToUndefined(input.phone) ?? null);
    if (email === null && phone === null) {
      throw new BadRequestException('Email or phone is required');
    }
    await this.ensureContactUnique(email, phone, user.id);

    user.email = email;
    user.phone = phone;
    if (!isBlank(input.fullName)) {
      user.fullName = input.fullName.trim();
    }
    if (!isBlank(input.password)) {
      user.passwordHash = await this.hashingService.hash(input.password);
    }

    return this.saveAudited(ctx, user, AUDIT_ACTION.UPDATE);
  }

  async updateRoles(ctx: RequestContext, id: string, selection: RoleSelection): Promise<User> {
    const user = await this.get(ctx, id);
    const roles = await this.resolveRoles(user.orgId, selection);
    user.roleIds = roles.roleIds;
    user.roleCodes = roles.roleCodes;
    return this.saveAudited(ctx, user, AUDIT_ACTION.UPDATE);
  }

  async updateStatus(ctx: RequestContext, id: string, status: string): Promise<User> {
    const user = await this.get(ctx, id);
    if (isBlank(status)) {
      throw new BadRequestException('Invalid status');
    }
    user.status = normalizeStatus(status);
    return this.saveAudited(ctx, user, AUDIT_ACTION.UPDATE);
  }

  /**
   * 软删除：状态置为 inactive，已签发的 refresh token 在下次刷新时被拒绝
   */
  async deactivate(ctx: RequestContext, id: string): Promise<void> {
    const user = await this.get(ctx, id);
    user.status = 'inactive';
    await this.saveAudited(ctx, user, AUDIT_ACTION.DELETE);
  }

  async permissions(ctx: RequestContext, id: string): Promise<string[]> {
    const user = await this.get(ctx, id);
    return this.permissionResolver.resolvePermissionCodes(user.id);
  }

  // ---------- 认证流程使用，不做租户过滤 ----------

  /**
   * 登录标识：先按邮箱 (大小写不敏感)，再按手机号
   */
  async findByLoginIdentifier(identifier: string): Promise<User | null> {
    const value = identifier.trim();
    if (!value) {
      return null;
    }
    const byEmail = await this.userRepository.findOneBy({ email: value.toLowerCase() });
    if (byEmail) {
      return byEmail;
    }
    return this.userRepository.findOneBy({ phone: value });
  }

  async findById(id: string): Promise<User | null> {
    return this.userRepository.findOneBy({ id });
  }

  async updatePasswordHash(ctx: RequestContext, userId: string, passwordHash: string): Promise<void> {
    await this.userRepository.manager.transaction(async (manager) => {
      await manager.getRepository(User).update({ id: userId }, { passwordHash });
      await this.audit(ctx, AUDIT_ACTION.UPDATE, userId, manager);
    });
  }

  /**
   * 角色解析
   *
   * 按 ID 或 code 指定角色，必须全部存在且属于用户所在机构；
   * 同时提供时两组必须表示同一个角色集合。返回值同时写入 roleIds 与 roleCodes。
   */
  private async resolveRoles(orgId: string, selection: RoleSelection): Promise<ResolvedRoles> {
    const roleIds = uniqueValues(selection.roleIds);
    const roleCodes = uniqueValues((selection.roleCodes ?? []).map((code) => code.trim()).filter((code) => code));

    let byIds: Role[] | null = null;
    if (roleIds.length) {
      byIds = await this.roleRepository.findBy({ id: In(roleIds) });
      if (byIds.length !== roleIds.length) {
        throw new BadRequestException('One or more role ids are invalid');
      }
      if (byIds.some((role) => role.orgId !== orgId)) {
        throw new BadRequestException('Role organization mismatch');
      }
    }

    let byCodes: Role[] | null = null;
    if (roleCodes.length) {
      byCodes = await this.roleRepository.findBy({ orgId, roleCode: In(roleCodes) });
      if (byCodes.length !== roleCodes.length) {
        throw new BadRequestException('One or more role codes are invalid');
      }
    }

    if (byIds && byCodes) {
      const codeIds = new Set(byCodes.map((role) => role.id));
      if (codeIds.size !== roleIds.length || roleIds.some((roleId) => !codeIds.has(roleId))) {
        throw new BadRequestException('Role ids and role codes do not match');
      }
    }

    const roles = byIds ?? byCodes ?? [];
    // 以请求中的顺序为准，便于客户端对照
    const order = byIds ? roleIds : roleCodes;
    const key = (role: Role) => (byIds ? role.id : role.roleCode);
    roles.sort((a, b) => order.indexOf(key(a)) - order.indexOf(key(b)));

    return {
      roleIds: roles.map((role) => role.id),
      roleCodes: roles.map((role) => role.roleCode),
    };
  }

  /**
   * 邮箱/手机号在全局范围内查重，保证登录标识唯一对应一个账号
   */
  private async ensureContactUnique(email: string | null, phone: string | null, excludeId: string | null): Promise<void> {
    if (email !== null) {
      const existing = await this.userRepository.findOneBy({ email });
      if (existing && existing.id !== excludeId) {
        throw new ConflictException('Email already exists');
      }
    }
    if (phone !== null) {
      const existing = await this.userRepository.findOneBy({ phone });
      if (existing && existing.id !== excludeId) {
        throw new ConflictException('Phone already exists');
      }
    }
  }

  private async saveAudited(ctx: RequestContext, user: User, action: AuditAction): Promise<User> {
    return this.userRepository.manager.transaction(async (manager) => {
      const saved = await manager.getRepository(User).save(user);
      await this.audit(ctx, action, saved.id, manager);
      return saved;
    });
  }

  private async audit(ctx: RequestContext, action: AuditAction, userId: string, manager: EntityManager) {
    await this.auditLogService.record(
      { ...auditActor(ctx), action, resource: AUDIT_RESOURCE.USERS, targetIds: [userId] },
      manager,
    );
  }

  private strictWrites(): boolean {
    return this.configService.get<boolean>('tenant.strictWrites') ?? false;
  }
}
