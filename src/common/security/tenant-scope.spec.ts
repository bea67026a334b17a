import { BadRequestException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { assertVisible, resolveOrganizationId, resolveScope, TenantActor } from './tenant-scope';

const tenantAdmin: TenantActor = { organizationId: 'org-a', superAdmin: false };
const superAdmin: TenantActor = { organizationId: null, superAdmin: true };

describe('tenant scope', () => {
  describe('resolveScope', () => {
    it('always returns the caller organization for a tenant user', () => {
      expect(resolveScope('org-b', tenantAdmin)).toBe('org-a');
      expect(resolveScope(undefined, tenantAdmin)).toBe('org-a');
    });

    it('passes the requested organization through for a super admin', () => {
      expect(resolveScope(' org-b ', superAdmin)).toBe('org-b');
    });

    it('means all organizations when a super admin requests none', () => {
      expect(resolveScope('', superAdmin)).toBeNull();
      expect(resolveScope(null, superAdmin)).toBeNull();
    });

    it('rejects a tenant user without an organization', () => {
      expect(() => resolveScope('org-a', { organizationId: '  ', superAdmin: false })).toThrow(
        new BadRequestException('organization_id is required for tenant scope'),
      );
    });
  });

  describe('resolveOrganizationId', () => {
    it('requires an explicit organization from a super admin', () => {
      expect(() => resolveOrganizationId(undefined, superAdmin)).toThrow(
        new BadRequestException('organization_id is required'),
      );
      expect(resolveOrganizationId('org-c', superAdmin)).toBe('org-c');
    });

    it('silently overrides a foreign organization for a tenant user', () => {
      expect(resolveOrganizationId('org-b', tenantAdmin)).toBe('org-a');
    });

    it('rejects a foreign organization in strict mode', () => {
      expect(() => resolveOrganizationId('org-b', tenantAdmin, { strict: true })).toThrow(ForbiddenException);
    });

    it('accepts the caller organization in strict mode', () => {
      expect(resolveOrganizationId('org-a', tenantAdmin, { strict: true })).toBe('org-a');
      expect(resolveOrganizationId(undefined, tenantAdmin, { strict: true })).toBe('org-a');
    });
  });

  describe('assertVisible', () => {
    it('hides records of other organizations behind a not found error', () => {
      expect(() => assertVisible('org-b', tenantAdmin, 'Role not found')).toThrow(
        new NotFoundException('Role not found'),
      );
    });

    it('lets tenant users see their own records and super admins see everything', () => {
      expect(() => assertVisible('org-a', tenantAdmin, 'Role not found')).not.toThrow();
      expect(() => assertVisible('org-b', superAdmin, 'Role not found')).not.toThrow();
    });
  });
});
