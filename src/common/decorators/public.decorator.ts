import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

// @Public()：跳过全局 JwtAuthGuard (登录、刷新令牌、健康检查等)
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
