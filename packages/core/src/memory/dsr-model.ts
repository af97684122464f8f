/**
 * DSR 记忆模型 - 难度 / 稳定性 / 可提取性
 *
 * 纯函数实现，无副作用：
 * - 可提取性 R(t) = exp(-t / S)
 * - 难度按评分增量更新并钳制在 [1, 10]
 * - 稳定性分三种情况：新卡初始化、遗忘 (Again)、成功回忆
 * - 间隔由稳定性与目标保持率推导
 */

import { Rating, type CardPhase, type MemoryParameters, type ReviewType } from '@spaced/shared';
import { ValidationError } from '../core/errors';

export const MS_PER_DAY = 86_400_000;
export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 10;
export const MIN_STABILITY = 0.1;

/** 复习次数达到该值后进入 REVIEW 阶段 */
export const LEARNING_GRADUATION_REVIEWS = 3;

/**
 * 评分前的记忆状态
 */
export interface MemorySnapshot {
  difficulty: number;
  stability: number;
  retrievability: number;
  phase: CardPhase;
}

/**
 * 调度结果
 */
export interface ScheduleOutcome {
  difficulty: number;
  stability: number;
  retrievability: number;
  intervalDays: number;
  nextReviewAt: Date;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 校验评分，非法评分在任何计算之前被拒绝
 */
export function assertRating(rating: number): asserts rating is Rating {
  if (
    rating !== Rating.AGAIN &&
    rating !== Rating.HARD &&
    rating !== Rating.GOOD &&
    rating !== Rating.EASY
  ) {
    throw new ValidationError(`未知评分: ${rating}`, 'rating');
  }
}

/**
 * 经过 elapsedDays 天后的可提取性
 */
export function retrievabilityAt(stability: number, elapsedDays: number): number {
  if (stability <= 0 || elapsedDays <= 0) {
    return 1;
  }
  return Math.exp(-elapsedDays / stability);
}

/**
 * 卡片在 now 时刻的可提取性，从未复习过的卡片为 1
 */
export function currentRetrievability(
  card: { stability: number; lastReviewAt: Date | null },
  now: Date,
): number {
  if (!card.lastReviewAt || card.stability <= 0) {
    return 1;
  }
  const elapsedDays = (now.getTime() - card.lastReviewAt.getTime()) / MS_PER_DAY;
  return retrievabilityAt(card.stability, elapsedDays);
}

/**
 * 预测 daysAhead 天后的保持率
 */
export function predictRetention(stability: number, daysAhead: number = 1): number {
  if (stability <= 0) {
    return 0;
  }
  return Math.exp(-daysAhead / stability);
}

export function nextDifficulty(difficulty: number, rating: Rating, weights: readonly number[]): number {
  const delta =
    rating === Rating.EASY ? -weights[6] * (rating - 3) : weights[6] * (rating - 3);
  return clamp(difficulty + delta, MIN_DIFFICULTY, MAX_DIFFICULTY);
}

/**
 * 新卡初始稳定性：按评分选取 w0..w3
 */
export function initialStability(rating: Rating, weights: readonly number[]): number {
  return Math.max(MIN_STABILITY, weights[rating - 1]);
}

export function nextStability(
  difficulty: number,
  stability: number,
  retrievability: number,
  rating: Rating,
  weights: readonly number[],
): number {
  const w = weights;

  if (rating === Rating.AGAIN) {
    const lapsed =
      w[11] *
      Math.pow(difficulty, -w[12]) *
      (Math.pow(stability + 1, w[13]) - 1) *
      Math.exp(w[14] * (1 - retrievability));
    return Math.max(MIN_STABILITY, lapsed);
  }

  const successFactor = (11 - difficulty) / (11 - w[17] * (11 - difficulty));
  const recalled =
    stability *
    (Math.exp(w[8]) *
      (11 - difficulty) *
      Math.pow(stability, -w[9]) *
      (Math.exp(w[10] * (1 - retrievability)) - 1) *
      successFactor +
      1);
  return Math.max(MIN_STABILITY, recalled);
}

/**
 * 下次复习间隔（天）
 *
 * ln(targetRetention) 为负，乘积不大于 0，间隔落在下限 1 天；
 * 降低目标保持率不会拉长间隔。
 */
export function nextInterval(stability: number, parameters: MemoryParameters): number {
  const raw = Math.floor(stability * Math.log(parameters.targetRetention));
  return Math.min(parameters.maximumIntervalDays, Math.max(1, raw));
}

/**
 * 计算一次评分后的新记忆状态
 */
export function scheduleNext(
  snapshot: MemorySnapshot,
  rating: Rating,
  parameters: MemoryParameters,
  now: Date,
): ScheduleOutcome {
  assertRating(rating);
  const w = parameters.weights;

  const difficulty = nextDifficulty(snapshot.difficulty, rating, w);
  const stability =
    snapshot.phase === 'NEW'
      ? initialStability(rating, w)
      : nextStability(snapshot.difficulty, snapshot.stability, snapshot.retrievability, rating, w);

  const intervalDays = nextInterval(stability, parameters);

  return {
    difficulty,
    stability,
    retrievability: Math.exp(-intervalDays / stability),
    intervalDays,
    nextReviewAt: new Date(now.getTime() + intervalDays * MS_PER_DAY),
  };
}

/**
 * 评分后的生命周期阶段：遗忘回到 LEARNING，复习满三次进入 REVIEW
 */
export function derivePhase(rating: Rating, reviewCountAfter: number): CardPhase {
  if (rating === Rating.AGAIN || reviewCountAfter < LEARNING_GRADUATION_REVIEWS) {
    return 'LEARNING';
  }
  return 'REVIEW';
}

/**
 * 复习日志中的复习类型
 */
export function classifyReview(phase: CardPhase, lapseCount: number): ReviewType {
  if (phase === 'NEW') {
    return 'learn';
  }
  if (phase === 'LEARNING' && lapseCount > 0) {
    return 'relearn';
  }
  return 'review';
}
