/**
 * 调度核心环境变量配置
 *
 * 使用 Zod 进行运行时验证，确保环境变量的类型安全和完整性
 * 所有环境变量都通过此文件统一访问，避免直接使用 process.env
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { startupLogger } from '../logger';

// 加载 .env 文件
config();

const intFromString = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10));

/**
 * 环境变量 Schema 定义
 */
export const envSchema = z.object({
  // ============================================
  // 运行环境
  // ============================================
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),

  // ============================================
  // SQLite 存储配置
  // ============================================
  DATABASE_PATH: z.string().min(1).default('data/scheduler.db'),

  SQLITE_JOURNAL_MODE: z.enum(['WAL', 'DELETE', 'MEMORY']).default('WAL'),

  SQLITE_BUSY_TIMEOUT_MS: intFromString('5000').pipe(z.number().int().nonnegative()),

  // ============================================
  // 学习者与会话默认值
  // ============================================
  DEFAULT_LEARNER_ID: z.string().min(1).default('local'),

  SESSION_MAX_REVIEWS: intFromString('50').pipe(
    z.number().int().positive().max(1000, 'SESSION_MAX_REVIEWS 不能超过 1000'),
  ),

  SESSION_MAX_NEW_CARDS: intFromString('20').pipe(
    z.number().int().positive().max(1000, 'SESSION_MAX_NEW_CARDS 不能超过 1000'),
  ),

  WEAK_FOCUS_LAPSE_THRESHOLD: intFromString('3').pipe(z.number().int().nonnegative()),
});

/**
 * 环境变量类型
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 验证并解析环境变量
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    const parsed = envSchema.parse({
      NODE_ENV: source.NODE_ENV,
      LOG_LEVEL: source.LOG_LEVEL,
      DATABASE_PATH: source.DATABASE_PATH,
      SQLITE_JOURNAL_MODE: source.SQLITE_JOURNAL_MODE,
      SQLITE_BUSY_TIMEOUT_MS: source.SQLITE_BUSY_TIMEOUT_MS,
      DEFAULT_LEARNER_ID: source.DEFAULT_LEARNER_ID,
      SESSION_MAX_REVIEWS: source.SESSION_MAX_REVIEWS,
      SESSION_MAX_NEW_CARDS: source.SESSION_MAX_NEW_CARDS,
      WEAK_FOCUS_LAPSE_THRESHOLD: source.WEAK_FOCUS_LAPSE_THRESHOLD,
    });

    if (parsed.NODE_ENV === 'production' && parsed.DATABASE_PATH === ':memory:') {
      startupLogger.warn('⚠️ 生产环境使用内存数据库，学习进度不会被保存');
    }

    startupLogger.debug(`环境变量验证成功 (环境: ${parsed.NODE_ENV})`);
    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      startupLogger.error('环境变量验证失败:');
      error.errors.forEach((err) => {
        startupLogger.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('环境变量配置错误，请检查 .env 文件');
    }
    throw error;
  }
}

/**
 * 导出验证后的环境变量
 *
 * @example
 * ```ts
 * import { env } from './config/env';
 * const limit = env.SESSION_MAX_REVIEWS;
 * ```
 */
export const env = validateEnv();
