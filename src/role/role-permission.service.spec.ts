import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { RolePermissionService } from './role-permission.service';
import { RoleService } from './role.service';
import { Role } from './entities/role.entity';
import { RolePermission } from './entities/role-permission.entity';
import { Permission } from '../permission/entities/permission.entity';
import { User } from '../user/entities/user.entity';
import { AuditLog } from '../audit/entities/audit-log.entity';
import { AuditLogService } from '../audit/audit-log.service';
import { InMemoryEntityManager } from '../testing/in-memory-repository';
import { superAdminContext, tenantContext, testConfigService } from '../testing/request-context.factory';
import { givenGrant, givenPermission, givenRole } from '../testing/fixtures';

const codes = (permissions: Permission[]) => permissions.map((permission) => permission.permissionCode);

describe('RolePermissionService', () => {
  let db: InMemoryEntityManager;
  let service: RolePermissionService;
  let cashier: Role;
  let billingRead: Permission;
  let billingWrite: Permission;
  const ctx = tenantContext('org-a', ['roles.read', 'roles.update']);

  beforeEach(async () => {
    db = new InMemoryEntityManager();
    const moduleRef = await Test.createTestingModule({
      providers: [
        RolePermissionService,
        RoleService,
        AuditLogService,
        ...db.providers(Role, RolePermission, Permission, User, AuditLog),
        { provide: ConfigService, useValue: testConfigService() },
      ],
    }).compile();
    service = moduleRef.get(RolePermissionService);

    cashier = await givenRole(db, 'org-a', 'cashier');
    billingRead = await givenPermission(db, 'org-a', 'billing', 'read');
    billingWrite = await givenPermission(db, 'org-a', 'billing', 'write');
  });

  it('replaces the assigned set and clears it with an empty list', async () => {
    await givenGrant(db, cashier, [billingRead]);

    const replaced = await service.replacePermissions(ctx, cashier.id, [billingWrite.id, billingWrite.id]);
    expect(codes(replaced)).toEqual(['billing.write']);
    expect(db.getRepository(RolePermission).all()).toHaveLength(1);

    await expect(service.replacePermissions(ctx, cashier.id, [])).resolves.toEqual([]);
    expect(db.getRepository(RolePermission).all()).toHaveLength(0);
  });

  it('adds only permissions that are not assigned yet', async () => {
    await givenGrant(db, cashier, [billingRead]);

    const assigned = await service.addPermissions(ctx, cashier.id, [billingRead.id, billingWrite.id]);

    expect(codes(assigned)).toEqual(['billing.read', 'billing.write']);
    expect(db.getRepository(RolePermission).all()).toHaveLength(2);
  });

  it('records the role and permission ids as audit targets', async () => {
    await service.addPermissions(ctx, cashier.id, [billingRead.id]);

    const [log] = db.getRepository(AuditLog).all();
    expect(log).toMatchObject({ action: 'update', resource: 'roles', userId: 'actor-1' });
    expect(log.payload.target_ids).toEqual([cashier.id, billingRead.id]);
  });

  it('rejects unknown and foreign permission ids', async () => {
    const foreign = await givenPermission(db, 'org-b', 'billing', 'read');

    await expect(service.addPermissions(ctx, cashier.id, ['00000000-0000-0000-0000-000000000000'])).rejects.toThrow(
      new NotFoundException('One or more permissions not found'),
    );
    await expect(service.replacePermissions(ctx, cashier.id, [foreign.id])).rejects.toThrow(
      new NotFoundException('Permission organization mismatch'),
    );
    expect(db.getRepository(RolePermission).all()).toHaveLength(0);
  });

  it('hides system permissions from tenant callers', async () => {
    const system = await givenPermission(db, 'org-a', 'system', 'manage', { scope: 'system' });

    await expect(service.addPermissions(ctx, cashier.id, [system.id])).rejects.toThrow(
      new NotFoundException('One or more permissions not found'),
    );

    const root = superAdminContext();
    await expect(service.addPermissions(root, cashier.id, [system.id])).resolves.toHaveLength(1);
    await expect(service.listPermissions(ctx, cashier.id)).resolves.toEqual([]);
    await expect(service.removePermission(ctx, cashier.id, system.id)).rejects.toThrow(
      new NotFoundException('Permission not assigned to role'),
    );
  });

  it('removes a single mapping', async () => {
    await givenGrant(db, cashier, [billingRead, billingWrite]);

    await service.removePermission(ctx, cashier.id, billingRead.id);

    expect(codes(await service.listPermissions(ctx, cashier.id))).toEqual(['billing.write']);
    await expect(service.removePermission(ctx, cashier.id, billingRead.id)).rejects.toThrow(
      new NotFoundException('Permission not assigned to role'),
    );
  });

  it('treats roles of other organizations as missing', async () => {
    const foreignRole = await givenRole(db, 'org-b', 'doctor');

    await expect(service.listPermissions(ctx, foreignRole.id)).rejects.toThrow(new NotFoundException('Role not found'));
  });
});
