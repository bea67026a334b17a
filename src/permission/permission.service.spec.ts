import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { buildPermissionCode, PermissionService } from './permission.service';
import { Permission } from './entities/permission.entity';
import { RolePermission } from '../role/entities/role-permission.entity';
import { AuditLog } from '../audit/entities/audit-log.entity';
import { AuditLogService } from '../audit/audit-log.service';
import { InMemoryEntityManager } from '../testing/in-memory-repository';
import { superAdminContext, tenantContext, testConfigService } from '../testing/request-context.factory';
import { givenGrant, givenPermission, givenRole } from '../testing/fixtures';

async function setup(strictWrites = false) {
  const db = new InMemoryEntityManager();
  const moduleRef = await Test.createTestingModule({
    providers: [
      PermissionService,
      AuditLogService,
      ...db.providers(Permission, RolePermission, AuditLog),
      { provide: ConfigService, useValue: testConfigService({ strictWrites }) },
    ],
  }).compile();
  return { db, service: moduleRef.get(PermissionService) };
}

const codes = (permissions: Permission[]) => permissions.map((permission) => permission.permissionCode);

describe('PermissionService', () => {
  const tenantAdmin = tenantContext('org-a', ['permissions.create']);

  it('builds the code from trimmed resource and action', () => {
    expect(buildPermissionCode(' billing ', ' read ')).toBe('billing.read');
  });

  describe('create', () => {
    it('stores a tenant permission in the caller organization and audits it', async () => {
      const { db, service } = await setup();

      const permission = await service.create(tenantAdmin, {
        organizationId: 'org-b',
        name: ' Read billing ',
        resource: ' billing ',
        action: ' read ',
      });

      expect(permission).toMatchObject({
        orgId: 'org-a',
        name: 'Read billing',
        permissionCode: 'billing.read',
        scope: 'tenant',
        active: true,
        description: null,
      });
      const [log] = db.getRepository(AuditLog).all();
      expect(log.action).toBe('create');
      expect(log.resource).toBe('permissions');
      expect(log.payload.target_ids).toEqual([permission.id]);
      expect(log.ipAddress).toBe('10.0.0.1');
    });

    it('rejects a duplicate code in the same organization', async () => {
      const { db, service } = await setup();
      await givenPermission(db, 'org-a', 'billing', 'read');

      await expect(
        service.create(tenantAdmin, { name: 'dup', resource: 'billing', action: 'read' }),
      ).rejects.toThrow(new ConflictException('Permission already exists'));
    });

    it('forces system scope for the system resource and refuses it to a tenant admin', async () => {
      const { db, service } = await setup();

      await expect(
        service.create(tenantAdmin, { name: 'manage', resource: 'system', action: 'manage', scope: 'tenant' }),
      ).rejects.toThrow(new ForbiddenException('system scope requires super admin'));
      expect(db.getRepository(Permission).all()).toHaveLength(0);
    });

    it('refuses an explicit system scope to a tenant admin and rejects unknown scopes', async () => {
      const { service } = await setup();

      await expect(
        service.create(tenantAdmin, { name: 'x', resource: 'reports', action: 'export', scope: 'SYSTEM' }),
      ).rejects.toThrow(ForbiddenException);
      await expect(
        service.create(tenantAdmin, { name: 'x', resource: 'reports', action: 'export', scope: 'global' }),
      ).rejects.toThrow(new BadRequestException('Invalid permission scope'));
    });

    it('lets a super admin create a system permission in an explicit organization', async () => {
      const { service } = await setup();
      const root = superAdminContext();

      await expect(service.create(root, { name: 'x', resource: 'System', action: 'manage' })).rejects.toThrow(
        new BadRequestException('organization_id is required'),
      );
      const permission = await service.create(root, {
        organizationId: 'org-a',
        name: 'Manage system',
        resource: 'System',
        action: 'manage',
      });
      expect(permission.scope).toBe('system');
      expect(permission.permissionCode).toBe('System.manage');
    });

    it('rejects a foreign organization when strict writes are enabled', async () => {
      const { service } = await setup(true);

      await expect(
        service.create(tenantAdmin, { organizationId: 'org-b', name: 'x', resource: 'billing', action: 'read' }),
      ).rejects.toThrow(ForbiddenException);
    });

    it('rolls the permission back when the audit entry cannot be written', async () => {
      const { db, service } = await setup();

      await expect(
        service.create(tenantContext('org-a', [], ''), { name: 'x', resource: 'billing', action: 'read' }),
      ).rejects.toThrow(new BadRequestException('actor_user_id is required for audit logging'));
      expect(db.getRepository(Permission).all()).toHaveLength(0);
    });
  });

  describe('list', () => {
    async function seeded() {
      const fixture = await setup();
      const { db } = fixture;
      await givenPermission(db, 'org-a', 'billing', 'read');
      await givenPermission(db, 'org-a', 'system', 'manage', { scope: 'system' });
      await givenPermission(db, 'org-a', 'reports', 'export', { scope: 'system' });
      await givenPermission(db, 'org-a', 'billing', 'write', { active: false });
      await givenPermission(db, 'org-b', 'billing', 'read');
      return fixture;
    }

    it('never shows system permissions to a tenant user, even when asked to', async () => {
      const { service } = await seeded();
      const ctx = tenantContext('org-b', ['permissions.read']);

      expect(codes(await service.list(ctx, { organizationId: 'org-a', includeSystem: true }))).toEqual([
        'billing.read',
      ]);
    });

    it('short-circuits a tenant query for the system resource', async () => {
      const { service } = await seeded();

      expect(await service.list(tenantContext('org-a'), { resource: 'system' })).toEqual([]);
    });

    it('filters by active, resource and action', async () => {
      const { service } = await seeded();
      const ctx = tenantContext('org-a');

      expect(codes(await service.list(ctx, { active: false }))).toEqual(['billing.write']);
      expect(codes(await service.list(ctx, { resource: 'billing', action: 'read' }))).toEqual(['billing.read']);
    });

    it('stores a permission created by a super admin without a scope as tenant and lists it only in its organization', async () => {
      const { service } = await setup();

      const created = await service.create(superAdminContext(), {
        organizationId: 'org-1',
        name: 'Read billing',
        resource: 'billing',
        action: 'read',
      });

      expect(created.scope).toBe('tenant');
      expect(created.permissionCode).toBe('billing.read');
      expect(codes(await service.list(tenantContext('org-1', ['permissions.read']), {}))).toEqual(['billing.read']);
      expect(await service.list(tenantContext('org-2', ['permissions.read']), {})).toEqual([]);
    });

    it('shows system permissions to a super admin only with includeSystem', async () => {
      const { service } = await seeded();
      const root = superAdminContext();

      expect(codes(await service.list(root, { organizationId: 'org-a', includeSystem: true }))).toEqual([
        'billing.read',
        'billing.write',
        'reports.export',
        'system.manage',
      ]);
      expect(await service.list(root, { includeSystem: false })).toHaveLength(3);
    });
  });

  describe('get', () => {
    it('returns not found across organizations and for hidden system permissions', async () => {
      const { db, service } = await setup();
      const foreign = await givenPermission(db, 'org-b', 'billing', 'read');
      const system = await givenPermission(db, 'org-a', 'system', 'manage', { scope: 'system' });
      const ctx = tenantContext('org-a');

      await expect(service.get(ctx, foreign.id)).rejects.toThrow(new NotFoundException('Permission not found'));
      await expect(service.get(ctx, system.id)).rejects.toThrow(NotFoundException);
      await expect(service.get(superAdminContext(), system.id)).resolves.toMatchObject({ id: system.id });
    });
  });

  describe('update', () => {
    it('recomputes the code and checks uniqueness against other permissions', async () => {
      const { db, service } = await setup();
      const read = await givenPermission(db, 'org-a', 'billing', 'read');
      await givenPermission(db, 'org-a', 'billing', 'write');

      const renamed = await service.update(tenantAdmin, read.id, { name: 'View', resource: 'billing', action: 'view' });
      expect(renamed.permissionCode).toBe('billing.view');

      const unchanged = await service.update(tenantAdmin, read.id, { name: 'View 2', resource: 'billing', action: 'view' });
      expect(unchanged.name).toBe('View 2');

      await expect(
        service.update(tenantAdmin, read.id, { name: 'x', resource: 'billing', action: 'write' }),
      ).rejects.toThrow(new ConflictException('Permission already exists'));
    });

    it('detaches the permission from every role when it is deactivated', async () => {
      const { db, service } = await setup();
      const read = await givenPermission(db, 'org-a', 'billing', 'read');
      const role = await givenRole(db, 'org-a', 'cashier');
      await givenGrant(db, role, [read]);

      const updated = await service.update(tenantAdmin, read.id, {
        name: 'Read billing',
        resource: 'billing',
        action: 'read',
        active: false,
      });

      expect(updated.active).toBe(false);
      expect(db.getRepository(RolePermission).all()).toHaveLength(0);
    });

    it('refuses to move a permission to another organization', async () => {
      const { db, service } = await setup();
      const read = await givenPermission(db, 'org-a', 'billing', 'read');

      await expect(
        service.update(superAdminContext(), read.id, {
          organizationId: 'org-b',
          name: 'x',
          resource: 'billing',
          action: 'read',
        }),
      ).rejects.toThrow(new BadRequestException('organization_id cannot be changed for permissions'));
    });
  });

  describe('deactivate', () => {
    it('marks the permission inactive and removes only its role mappings', async () => {
      const { db, service } = await setup();
      const read = await givenPermission(db, 'org-a', 'billing', 'read');
      const write = await givenPermission(db, 'org-a', 'billing', 'write');
      const cashier = await givenRole(db, 'org-a', 'cashier');
      const manager = await givenRole(db, 'org-a', 'manager');
      await givenGrant(db, cashier, [read]);
      await givenGrant(db, manager, [read, write]);

      await service.deactivate(tenantAdmin, read.id);

      const stored = await db.getRepository(Permission).findOneBy({ id: read.id });
      expect(stored?.active).toBe(false);
      const remaining = db.getRepository(RolePermission).all();
      expect(remaining.map((mapping) => mapping.permissionId)).toEqual([write.id]);
      const [log] = db.getRepository(AuditLog).all();
      expect(log.action).toBe('delete');
      expect(log.payload.target_ids).toEqual([read.id]);
    });
  });
});
