import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';
import { createRequestContext, isAuthPrincipal, RequestContext } from '../security/request-context';
import { extractClientMeta } from './client-meta.decorator';

/**
 * @CurrentActor() 参数装饰器
 *
 * 将 JwtStrategy 挂载的 req.user 与客户端信息组合成 RequestContext，
 * 控制器把它作为普通参数继续传给服务层。
 */
export const CurrentActor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestContext => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const principal: unknown = Reflect.get(request, 'user');
    if (!isAuthPrincipal(principal)) {
      throw new UnauthorizedException('Unauthorized');
    }
    return createRequestContext(principal, extractClientMeta(request));
  },
);
