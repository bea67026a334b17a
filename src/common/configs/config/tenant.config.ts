import { registerAs } from '@nestjs/config';

/**
 * 多租户写入策略
 *
 * - TENANT_STRICT_WRITES=false (默认): 非超级管理员在请求体中携带的 organizationId 会被静默替换为其所属机构
 * - TENANT_STRICT_WRITES=true: 机构不一致时直接返回 403，便于尽早暴露客户端缺陷
 */
export default registerAs('tenant', () => ({
  strictWrites: process.env.TENANT_STRICT_WRITES === 'true',
}));
