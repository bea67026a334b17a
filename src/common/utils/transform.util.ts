import { TransformFnParams } from 'class-transformer';

/**
 * 查询参数中的 "true"/"false" 转为布尔值，其余值原样交给 class-validator 报错
 */
export function toOptionalBoolean({ value }: TransformFnParams): unknown {
  if (value === 'true' || value === true) {
    return true;
  }
  if (value === 'false' || value === false) {
    return false;
  }
  return value;
}

/**
 * 逗号分隔或重复出现的查询参数统一转为字符串数组
 */
export function toStringArray({ value }: TransformFnParams): unknown {
  if (typeof value === 'string') {
    return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  }
  return value;
}
