import { registerAs } from '@nestjs/config';

/**
 * 令牌配置
 *
 * Access Token 为 HS256 签名的 JWT；Refresh Token 为不透明随机串，服务端只保存其 SHA-256 摘要。
 *
 * 敏感信息 (必须从环境变量读取):
 * - JWT_SECRET: Access Token 签名密钥，至少 32 字节
 *
 * 业务配置 (代码默认值，可被环境变量覆盖):
 * - JWT_ISSUER: iss 声明 (默认 clinic-identity)
 * - JWT_ACCESS_EXPIRES_IN: Access Token 过期时间 (默认 15m)
 * - JWT_REFRESH_EXPIRES_IN: Refresh Token 过期时间 (默认 7d)
 * - REFRESH_TOKEN_BYTES: Refresh Token 随机字节数 (默认 32)
 */
export default registerAs('jwt', () => ({
  issuer: process.env.JWT_ISSUER || 'clinic-identity',
  secret: process.env.JWT_SECRET,
  accessExpiresIn: process.env.JWT_ACCESS_EXPIRES_IN || '15m',
  refreshExpiresIn: process.env.JWT_REFRESH_EXPIRES_IN || '7d',
  refreshTokenBytes: parseInt(process.env.REFRESH_TOKEN_BYTES || '32', 10),
}));
