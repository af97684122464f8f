/**
 * 算法参数服务
 * 管理每个学习者的记忆模型参数，支持缓存
 */

import {
  MemoryParametersSchema,
  type ID,
  type MemoryParameters,
  type MemoryParametersInput,
} from '@spaced/shared';
import { ValidationError, toSchedulingError } from '../core/errors';
import { fail, ok, type ServiceResult } from '../core/result';
import { createChildLogger } from '../logger';
import { DEFAULT_MEMORY_PARAMETERS, createMemoryParameters, loadMemoryParameters } from '../memory';
import type { ParameterRepository } from '../repositories';

const logger = createChildLogger({ module: 'parameter-store' });

export class ParameterStore {
  private cache = new Map<ID, MemoryParameters>();

  constructor(
    private readonly repository: ParameterRepository,
    private readonly defaults: MemoryParameters = DEFAULT_MEMORY_PARAMETERS,
  ) {}

  /**
   * 启动时校验并缓存全部已保存的参数
   * 任一学习者的参数损坏即抛出 ConfigurationError，调度核心不会启动
   */
  initialize(): number {
    const rows = this.repository.listAll();
    const loaded = new Map<ID, MemoryParameters>();

    for (const { learnerId, ...stored } of rows) {
      try {
        loaded.set(learnerId, loadMemoryParameters(stored));
      } catch (error) {
        logger.fatal({ err: error, learnerId }, '[ParameterStore] 存储的算法参数无效');
        throw error;
      }
    }

    this.cache = loaded;
    logger.info({ learners: loaded.size }, '[ParameterStore] 算法参数已加载');
    return loaded.size;
  }

  /**
   * 获取学习者当前生效的参数（带缓存）
   * 未保存过参数时返回内置默认值；存储中的参数损坏时抛出 ConfigurationError
   */
  getActiveParameters(learnerId: ID): MemoryParameters {
    const cached = this.cache.get(learnerId);
    if (cached) {
      return cached;
    }

    const stored = this.repository.get(learnerId);
    if (!stored) {
      return this.defaults;
    }

    let parameters: MemoryParameters;
    try {
      parameters = loadMemoryParameters(stored);
    } catch (error) {
      logger.fatal({ err: error, learnerId }, '[ParameterStore] 存储的算法参数无效');
      throw error;
    }

    this.cache.set(learnerId, parameters);
    logger.debug({ learnerId }, '[ParameterStore] 已加载学习者参数');
    return parameters;
  }

  /**
   * 保存学习者参数，并清除缓存
   */
  async saveParameters(
    learnerId: ID,
    input: MemoryParametersInput,
  ): Promise<ServiceResult<MemoryParameters>> {
    const parsed = MemoryParametersSchema.safeParse(input);
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error));
    }

    const parameters = createMemoryParameters(parsed.data);
    try {
      this.repository.save(learnerId, parameters);
    } catch (error) {
      const failure = toSchedulingError(error, '保存算法参数失败');
      logger.error({ err: failure, learnerId }, '[ParameterStore] 保存算法参数失败');
      return fail(failure);
    }

    this.cache.delete(learnerId);
    logger.info(
      { learnerId, targetRetention: parameters.targetRetention },
      '[ParameterStore] 算法参数已更新',
    );
    return ok(parameters);
  }

  /**
   * 清除缓存
   */
  clearCache(learnerId?: ID): void {
    if (learnerId) {
      this.cache.delete(learnerId);
    } else {
      this.cache.clear();
    }
  }
}
