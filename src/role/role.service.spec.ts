import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { RoleService } from './role.service';
import { Role } from './entities/role.entity';
import { RolePermission } from './entities/role-permission.entity';
import { User } from '../user/entities/user.entity';
import { AuditLog } from '../audit/entities/audit-log.entity';
import { AuditLogService } from '../audit/audit-log.service';
import { InMemoryEntityManager } from '../testing/in-memory-repository';
import { superAdminContext, tenantContext, testConfigService } from '../testing/request-context.factory';
import { givenGrant, givenPermission, givenRole, givenUser } from '../testing/fixtures';

describe('RoleService', () => {
  let db: InMemoryEntityManager;
  let service: RoleService;
  const ctx = tenantContext('org-a', ['roles.create', 'roles.update', 'roles.delete']);

  beforeEach(async () => {
    db = new InMemoryEntityManager();
    const moduleRef = await Test.createTestingModule({
      providers: [
        RoleService,
        AuditLogService,
        ...db.providers(Role, RolePermission, User, AuditLog),
        { provide: ConfigService, useValue: testConfigService() },
      ],
    }).compile();
    service = moduleRef.get(RoleService);
  });

  it('creates a role in the caller organization', async () => {
    const role = await service.create(ctx, { name: ' Front desk ', roleCode: ' front_desk ' });

    expect(role).toMatchObject({ orgId: 'org-a', name: 'Front desk', roleCode: 'front_desk', description: null });
    const [log] = db.getRepository(AuditLog).all();
    expect(log.action).toBe('create');
    expect(log.resource).toBe('roles');
  });

  it('rejects duplicate codes and names within an organization', async () => {
    await givenRole(db, 'org-a', 'cashier', { name: 'Cashier' });
    await givenRole(db, 'org-b', 'doctor', { name: 'Doctor' });

    await expect(service.create(ctx, { name: 'Other', roleCode: 'cashier' })).rejects.toThrow(
      new ConflictException('Role code already exists'),
    );
    await expect(service.create(ctx, { name: 'Cashier', roleCode: 'cashier_2' })).rejects.toThrow(
      new ConflictException('Role name already exists'),
    );
    await expect(service.create(ctx, { name: 'Doctor', roleCode: 'doctor' })).resolves.toMatchObject({
      orgId: 'org-a',
    });
  });

  it('lists only the caller organization for tenant users', async () => {
    await givenRole(db, 'org-a', 'nurse');
    await givenRole(db, 'org-a', 'cashier');
    await givenRole(db, 'org-b', 'doctor');

    const tenantRoles = await service.list(ctx, 'org-b');
    expect(tenantRoles.map((role) => role.roleCode)).toEqual(['cashier', 'nurse']);
    expect(await service.list(superAdminContext())).toHaveLength(3);
  });

  it('hides roles of other organizations', async () => {
    const foreign = await givenRole(db, 'org-b', 'doctor');

    await expect(service.get(ctx, foreign.id)).rejects.toThrow(new NotFoundException('Role not found'));
  });

  it('renames the role code on every user holding the role', async () => {
    const cashier = await givenRole(db, 'org-a', 'cashier');
    const nurse = await givenRole(db, 'org-a', 'nurse');
    const user = await givenUser(db, 'org-a', { email: 'a@clinic.test' }, [nurse, cashier]);

    await service.update(ctx, cashier.id, { name: 'Cashier', roleCode: 'billing_clerk' });

    const stored = await db.getRepository(User).findOneBy({ id: user.id });
    expect(stored?.roleIds).toEqual([nurse.id, cashier.id]);
    expect(stored?.roleCodes).toEqual(['nurse', 'billing_clerk']);
  });

  it('refuses to move a role to another organization', async () => {
    const cashier = await givenRole(db, 'org-a', 'cashier');

    await expect(
      service.update(superAdminContext(), cashier.id, { organizationId: 'org-b', name: 'Cashier', roleCode: 'cashier' }),
    ).rejects.toThrow(new BadRequestException('organization_id cannot be changed for roles'));
  });

  describe('delete', () => {
    it('is blocked while permissions are assigned', async () => {
      const cashier = await givenRole(db, 'org-a', 'cashier');
      await givenGrant(db, cashier, [await givenPermission(db, 'org-a', 'billing', 'read')]);

      await expect(service.delete(ctx, cashier.id)).rejects.toThrow(
        new ConflictException('Role has assigned permissions'),
      );
    });

    it('is blocked while users hold the role', async () => {
      const cashier = await givenRole(db, 'org-a', 'cashier');
      await givenUser(db, 'org-a', { phone: '+10000000001' }, [cashier]);

      await expect(service.delete(ctx, cashier.id)).rejects.toThrow(new ConflictException('Role is assigned to users'));
    });

    it('removes an unreferenced role and audits it', async () => {
      const cashier = await givenRole(db, 'org-a', 'cashier');

      await service.delete(ctx, cashier.id);

      expect(db.getRepository(Role).all()).toHaveLength(0);
      const [log] = db.getRepository(AuditLog).all();
      expect(log.action).toBe('delete');
      expect(log.payload.target_ids).toEqual([cashier.id]);
    });
  });
});
