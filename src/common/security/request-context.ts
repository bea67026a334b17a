import { isSuperAdmin } from './authority';

/**
 * 访问令牌校验通过后挂载到 req.user 的主体信息
 */
export interface AuthPrincipal {
  userId: string;
  organizationId: string | null;
  name: string | null;
  roles: string[];
  permissions: string[];
}

/**
 * 调用方的网络信息，用于审计
 */
export interface ClientMeta {
  ipAddress: string | null;
  userAgent: string | null;
}

/**
 * 请求级安全上下文
 *
 * 每个请求构造一次，作为参数显式传入身份核心的每个操作；
 * 服务层不读取任何全局/线程级状态。
 */
export interface RequestContext extends ClientMeta {
  readonly actorUserId: string;
  readonly organizationId: string | null;
  readonly permissions: readonly string[];
  readonly superAdmin: boolean;
}

export function createRequestContext(principal: AuthPrincipal, client: ClientMeta): RequestContext {
  const permissions = [...principal.permissions];
  return {
    actorUserId: principal.userId,
    organizationId: principal.organizationId,
    permissions,
    superAdmin: isSuperAdmin(permissions),
    ipAddress: client.ipAddress,
    userAgent: client.userAgent,
  };
}

export function isAuthPrincipal(value: unknown): value is AuthPrincipal {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return typeof Reflect.get(value, 'userId') === 'string'
    && Array.isArray(Reflect.get(value, 'permissions'))
    && Array.isArray(Reflect.get(value, 'roles'));
}

// 下游业务模块只允许依赖以下访问器，不感知身份核心的内部结构

export function currentActorId(ctx: RequestContext): string {
  return ctx.actorUserId;
}

export function currentOrganizationId(ctx: RequestContext): string | null {
  return ctx.organizationId;
}

export function currentPermissions(ctx: RequestContext): readonly string[] {
  return ctx.permissions;
}
