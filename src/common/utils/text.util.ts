/**
 * 判断字符串是否为空 (null / undefined / 仅空白)
 */
export function isBlank(value: string | null | undefined): value is null | undefined | '' {
  return value === null || value === undefined || value.trim().length === 0;
}

/**
 * 去除首尾空白，空串归一为 undefined
 */
export function trimToUndefined(value: string | null | undefined): string | undefined {
  if (isBlank(value)) {
    return undefined;
  }
  return value.trim();
}

/**
 * 去重并保持首次出现的顺序
 */
export function uniqueValues<T>(values: readonly T[] | null | undefined): T[] {
  return Array.from(new Set(values ?? []));
}
