import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { PermissionResolverService } from './permission-resolver.service';
import { Permission } from './entities/permission.entity';
import { RolePermission } from '../role/entities/role-permission.entity';
import { User } from '../user/entities/user.entity';
import { InMemoryEntityManager } from '../testing/in-memory-repository';
import { givenGrant, givenPermission, givenRole, givenUser } from '../testing/fixtures';

describe('PermissionResolverService', () => {
  let db: InMemoryEntityManager;
  let resolver: PermissionResolverService;

  beforeEach(async () => {
    db = new InMemoryEntityManager();
    const moduleRef = await Test.createTestingModule({
      providers: [PermissionResolverService, ...db.providers(User, RolePermission, Permission)],
    }).compile();
    resolver = moduleRef.get(PermissionResolverService);
  });

  it('unions the permissions of every role, deduplicated and sorted by code', async () => {
    const read = await givenPermission(db, 'org-a', 'billing', 'read');
    const audit = await givenPermission(db, 'org-a', 'audit', 'view');
    const cashier = await givenRole(db, 'org-a', 'cashier');
    const auditor = await givenRole(db, 'org-a', 'auditor');
    await givenGrant(db, cashier, [read]);
    await givenGrant(db, auditor, [audit, read]);
    const user = await givenUser(db, 'org-a', {}, [cashier, auditor]);

    const permissions = await resolver.resolvePermissions(user.id);

    expect(permissions.map((permission) => permission.id)).toEqual([audit.id, read.id]);
    expect(await resolver.resolvePermissionCodes(user.id)).toEqual(['audit.view', 'billing.read']);
  });

  it('drops inactive permissions even when a stale mapping still points at them', async () => {
    const read = await givenPermission(db, 'org-a', 'billing', 'read');
    const write = await givenPermission(db, 'org-a', 'billing', 'write', { active: false });
    const cashier = await givenRole(db, 'org-a', 'cashier');
    await givenGrant(db, cashier, [read, write]);
    const user = await givenUser(db, 'org-a', {}, [cashier]);

    expect(await resolver.resolvePermissionCodes(user.id)).toEqual(['billing.read']);
  });

  it('returns nothing for a user without roles', async () => {
    const user = await givenUser(db, 'org-a');

    expect(await resolver.resolvePermissions(user.id)).toEqual([]);
  });

  it('fails for an unknown user', async () => {
    await expect(resolver.resolvePermissionCodes('missing')).rejects.toThrow(new NotFoundException('User not found'));
  });
});
