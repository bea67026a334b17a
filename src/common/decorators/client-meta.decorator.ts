import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import type { Request } from 'express';
import { ClientMeta } from '../security/request-context';
import { isBlank } from '../utils/text.util';

/**
 * 提取客户端信息所需的最小请求结构，express Request 天然满足
 */
export interface ClientRequestLike {
  headers: IncomingHttpHeaders;
  socket?: { remoteAddress?: string };
}

/**
 * 从请求中提取客户端 IP 与 User-Agent
 * 经过反向代理时取 X-Forwarded-For 的第一个地址
 */
export function extractClientMeta(request: ClientRequestLike): ClientMeta {
  const forwarded = request.headers['x-forwarded-for'];
  const forwardedValue = Array.isArray(forwarded) ? forwarded[0] : forwarded;

  let ipAddress: string | null = request.socket?.remoteAddress ?? null;
  if (!isBlank(forwardedValue)) {
    ipAddress = forwardedValue.split(',')[0].trim();
  }

  const userAgent = request.headers['user-agent'];
  return {
    ipAddress,
    userAgent: isBlank(userAgent) ? null : userAgent,
  };
}

/**
 * @ClientInfo() 参数装饰器，供无需登录的认证接口 (login / refresh / logout) 使用
 */
export const ClientInfo = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): ClientMeta => {
    return extractClientMeta(ctx.switchToHttp().getRequest<Request>());
  },
);
