import { UnauthorizedException } from '@nestjs/common';
import { JwtStrategy } from './jwt.strategy';
import { testConfigService } from '../../testing/request-context.factory';

describe('JwtStrategy', () => {
  const strategy = new JwtStrategy(testConfigService());

  it('maps claims to the authenticated principal', () => {
    expect(
      strategy.validate({
        sub: 'user-1',
        org_id: 'org-a',
        roles: ['cashier'],
        permissions: ['billing.read'],
        name: '',
      }),
    ).toEqual({
      userId: 'user-1',
      organizationId: 'org-a',
      name: null,
      roles: ['cashier'],
      permissions: ['billing.read'],
    });
  });

  it('keeps a missing organization as null', () => {
    expect(strategy.validate({ sub: 'root-1', roles: [], permissions: ['system.super_admin'] }).organizationId).toBeNull();
  });

  it('rejects malformed claims', () => {
    expect(() => strategy.validate({ sub: 'user-1', roles: 'cashier', permissions: [] })).toThrow(
      new UnauthorizedException('Invalid or missing access token'),
    );
    expect(() => strategy.validate({ roles: [], permissions: [] })).toThrow(UnauthorizedException);
  });
});
