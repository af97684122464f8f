/**
 * 记忆卡片相关类型定义
 *
 * DSR 记忆模型：
 * - Difficulty: 难度 [1, 10]
 * - Stability: 稳定性（天）
 * - Retrievability: 可提取性（回忆概率）
 */

import type { BaseEntity, ID } from './common';

/**
 * 评分等级
 */
export enum Rating {
  AGAIN = 1,
  HARD = 2,
  GOOD = 3,
  EASY = 4,
}

/**
 * 卡片生命周期阶段
 */
export type CardPhase = 'NEW' | 'LEARNING' | 'REVIEW';

/**
 * 复习类型（写入复习日志）
 */
export type ReviewType = 'learn' | 'review' | 'relearn';

/**
 * 记忆模型参数
 */
export interface MemoryParameters {
  /** 权重向量 w0..w18 */
  readonly weights: readonly number[];
  /** 目标保持率 (0, 1) */
  readonly targetRetention: number;
  /** 最大间隔（天） */
  readonly maximumIntervalDays: number;
}

/**
 * 学习者-学习项的记忆状态
 */
export interface CardState extends BaseEntity {
  learnerId: ID;
  itemId: ID;
  difficulty: number;
  stability: number;
  retrievability: number;
  phase: CardPhase;
  reviewCount: number;
  lapseCount: number;
  successCount: number;
  lastReviewAt: Date | null;
  nextReviewAt: Date;
}

/**
 * 复习日志（只追加）
 */
export interface ReviewRecord {
  id: ID;
  cardId: ID;
  itemId: ID;
  rating: Rating;
  responseTimeMs: number;
  difficultyBefore: number;
  stabilityBefore: number;
  retrievabilityBefore: number;
  difficultyAfter: number;
  stabilityAfter: number;
  retrievabilityAfter: number;
  intervalDays: number;
  sessionId: ID | null;
  reviewType: ReviewType;
  reviewedAt: Date;
}

/**
 * 学习项（题目），只关心标准答案与分类
 */
export interface StudyItem {
  id: ID;
  answer: string;
  category: string | null;
}

/**
 * 学习统计
 */
export interface LearningStats {
  totalCards: number;
  newCards: number;
  learningCards: number;
  reviewCards: number;
  dueCards: number;
  overdueCards: number;
  averageDifficulty: number;
  averageStability: number;
  /** 最近 30 天的保持率 */
  retentionRate: number;
}
