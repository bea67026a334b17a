import { ForbiddenException } from '@nestjs/common';

/**
 * 超级管理员权限码，持有者不受租户边界限制
 */
export const SUPER_ADMIN_PERMISSION = 'system.super_admin';

/**
 * 只关心权限集合的最小上下文，RequestContext 与测试桩都满足它
 */
export interface AuthorityHolder {
  readonly permissions: readonly string[];
}

export function isSuperAdmin(permissions: readonly string[]): boolean {
  return permissions.includes(SUPER_ADMIN_PERMISSION);
}

export function hasAuthority(holder: AuthorityHolder, permissionCode: string): boolean {
  return holder.permissions.includes(permissionCode);
}

/**
 * 显式权限检查，放在每个对外操作的第一行
 * 替代注解式的 hasAuthority('x.y')，调用点一目了然
 */
export function requireAuthority(holder: AuthorityHolder, permissionCode: string): void {
  if (!hasAuthority(holder, permissionCode)) {
    throw new ForbiddenException(`Missing authority: ${permissionCode}`);
  }
}
