/**
 * 调度相关Zod Schema
 * 用于运行时验证和类型推断
 */

import { z } from 'zod';
import { Rating } from '../types/card';

/** 记忆模型权重个数 */
export const MEMORY_WEIGHT_COUNT = 19;

/**
 * 评分Schema
 */
export const RatingSchema = z.nativeEnum(Rating, {
  errorMap: () => ({ message: 'rating 必须是 1(Again)、2(Hard)、3(Good) 或 4(Easy)' }),
});

/**
 * 卡片阶段Schema
 */
export const CardPhaseSchema = z.enum(['NEW', 'LEARNING', 'REVIEW']);

/**
 * 会话类型Schema
 */
export const SessionTypeSchema = z.enum(['review', 'learn', 'weak_focus']);

/**
 * 复习评分请求Schema
 */
export const ReviewRequestSchema = z.object({
  cardId: z.string().min(1, 'cardId 不能为空'),
  rating: RatingSchema,
  responseTimeMs: z.number().finite().nonnegative('responseTimeMs 不能为负数'),
  sessionId: z.string().min(1).optional(),
});

/**
 * 记忆模型参数Schema
 */
export const MemoryParametersSchema = z.object({
  weights: z
    .array(z.number().finite('权重必须是有限数值'))
    .min(MEMORY_WEIGHT_COUNT, `权重向量至少需要 ${MEMORY_WEIGHT_COUNT} 个元素`),
  targetRetention: z
    .number()
    .gt(0, 'targetRetention 必须大于 0')
    .lt(1, 'targetRetention 必须小于 1'),
  maximumIntervalDays: z.number().int().min(1).default(36500),
});

/**
 * 会话配置Schema
 */
export const SessionConfigSchema = z.object({
  learnerId: z.string().min(1, 'learnerId 不能为空'),
  sessionType: SessionTypeSchema,
  maxReviews: z.number().int().positive().max(1000),
  maxNewCards: z.number().int().positive().max(1000),
  // 记录用，不参与调度
  targetRetention: z.number().gt(0).lt(1),
  weakLapseThreshold: z.number().int().nonnegative(),
});

/**
 * 提交答案Schema
 */
export const SubmitAnswerSchema = z.object({
  sessionId: z.string().min(1, 'sessionId 不能为空'),
  cardId: z.string().min(1, 'cardId 不能为空'),
  answer: z.string().nullable(),
  responseTimeMs: z.number().finite().nonnegative('responseTimeMs 不能为负数'),
  rating: RatingSchema.optional(),
});

export type ReviewRequest = z.infer<typeof ReviewRequestSchema>;
export type MemoryParametersInput = z.input<typeof MemoryParametersSchema>;
export type SubmitAnswerInput = z.infer<typeof SubmitAnswerSchema>;
