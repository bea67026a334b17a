/**
 * 时间单位换算（秒）
 */
export const TIME_IN_SECONDS = {
  SECOND: 1,
  MINUTE: 60,
  HOUR: 3600,
  DAY: 86400,
} as const;

const UNIT_SECONDS: Record<string, number> = {
  s: TIME_IN_SECONDS.SECOND,
  m: TIME_IN_SECONDS.MINUTE,
  h: TIME_IN_SECONDS.HOUR,
  d: TIME_IN_SECONDS.DAY,
};

/**
 * 将过期时间字符串解析为秒数
 * 支持格式：30s, 15m, 1h, 7d 等；格式不合法时抛错（配置在启动阶段已由 Joi 校验）
 */
export function parseExpiresInToSeconds(expiresIn: string): number {
  const match = expiresIn.trim().match(/^(\d+)([smhd])$/);
  if (!match) {
    throw new Error(`Invalid duration: "${expiresIn}"`);
  }

  return parseInt(match[1], 10) * UNIT_SECONDS[match[2]];
}
