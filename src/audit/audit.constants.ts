/**
 * 审计动作
 */
export const AUDIT_ACTION = {
  CREATE: 'create',
  UPDATE: 'update',
  DELETE: 'delete',
  LOGIN: 'login',
} as const;

export type AuditAction = (typeof AUDIT_ACTION)[keyof typeof AUDIT_ACTION];

/**
 * 审计资源，与表名保持一致
 */
export const AUDIT_RESOURCE = {
  AUTH: 'auth',
  USERS: 'users',
  ROLES: 'roles',
  PERMISSIONS: 'permissions',
  REFRESH_TOKENS: 'refresh_tokens',
} as const;

export type AuditResource = (typeof AUDIT_RESOURCE)[keyof typeof AUDIT_RESOURCE];
