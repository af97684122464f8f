/**
 * 记忆模型参数
 *
 * 默认权重取自 FSRS-5 的公开默认值，目标保持率 0.9
 */

import { MemoryParametersSchema, type MemoryParameters, type MemoryParametersInput } from '@spaced/shared';
import { ConfigurationError } from '../core/errors';

export const DEFAULT_WEIGHTS: readonly number[] = Object.freeze([
  0.5701, 1.4436, 4.1386, 10.9355, 5.1443, 1.2006, 0.8627, 0.0362, 1.629, 0.1342, 1.0166,
  2.1174, 0.0839, 0.3204, 1.4676, 0.219, 2.8237, 0.2188, 0.9859,
]);

export const DEFAULT_TARGET_RETENTION = 0.9;

export const DEFAULT_MAXIMUM_INTERVAL_DAYS = 36500;

/**
 * 校验并冻结参数，任何不合法输入都是致命配置错误
 */
export function createMemoryParameters(input: MemoryParametersInput): MemoryParameters {
  return loadMemoryParameters(input);
}

/**
 * 从存储中的原始值加载参数
 */
export function loadMemoryParameters(raw: unknown): MemoryParameters {
  const result = MemoryParametersSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.errors
      .map((issue) => `${issue.path.join('.') || 'parameters'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`记忆模型参数无效 - ${detail}`);
  }

  return Object.freeze({
    weights: Object.freeze([...result.data.weights]),
    targetRetention: result.data.targetRetention,
    maximumIntervalDays: result.data.maximumIntervalDays,
  });
}

export const DEFAULT_MEMORY_PARAMETERS: MemoryParameters = createMemoryParameters({
  weights: [...DEFAULT_WEIGHTS],
  targetRetention: DEFAULT_TARGET_RETENTION,
  maximumIntervalDays: DEFAULT_MAXIMUM_INTERVAL_DAYS,
});
