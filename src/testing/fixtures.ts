import { InMemoryEntityManager } from './in-memory-repository';
import { Permission } from '../permission/entities/permission.entity';
import { Role } from '../role/entities/role.entity';
import { RolePermission } from '../role/entities/role-permission.entity';
import { User } from '../user/entities/user.entity';

/**
 * 测试数据构造，直接写入内存仓库，不经过服务层校验与审计
 */

export async function givenPermission(
  db: InMemoryEntityManager,
  orgId: string,
  resource: string,
  action: string,
  overrides: Partial<Permission> = {},
): Promise<Permission> {
  const repository = db.getRepository(Permission);
  return repository.save(
    repository.create({
      orgId,
      name: `${resource} ${action}`,
      permissionCode: `${resource}.${action}`,
      scope: 'tenant',
      resource,
      action,
      description: null,
      active: true,
      ...overrides,
    }),
  );
}

export async function givenRole(
  db: InMemoryEntityManager,
  orgId: string,
  roleCode: string,
  overrides: Partial<Role> = {},
): Promise<Role> {
  const repository = db.getRepository(Role);
  return repository.save(repository.create({ orgId, name: roleCode, roleCode, description: null, ...overrides }));
}

export async function givenGrant(db: InMemoryEntityManager, role: Role, permissions: Permission[]): Promise<void> {
  const repository = db.getRepository(RolePermission);
  for (const permission of permissions) {
    await repository.save(repository.create({ orgId: role.orgId, roleId: role.id, permissionId: permission.id }));
  }
}

export async function givenUser(
  db: InMemoryEntityManager,
  orgId: string,
  overrides: Partial<User> = {},
  roles: Role[] = [],
): Promise<User> {
  const repository = db.getRepository(User);
  return repository.save(
    repository.create({
      orgId,
      fullName: 'Test User',
      email: null,
      phone: null,
      passwordHash: null,
      status: 'active',
      roleIds: roles.map((role) => role.id),
      roleCodes: roles.map((role) => role.roleCode),
      ...overrides,
    }),
  );
}
