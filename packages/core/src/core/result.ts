import type { SchedulingError } from './errors';

/**
 * 服务层统一返回类型
 * 失败以标签结果返回，不让异常越过用例边界
 */
export type ServiceResult<T, E extends SchedulingError = SchedulingError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): ServiceResult<T, never> {
  return { success: true, data };
}

export function fail<E extends SchedulingError>(error: E): ServiceResult<never, E> {
  return { success: false, error };
}
