/**
 * 学习会话相关类型定义
 */

import type { ID } from './common';
import type { CardState, Rating } from './card';

/**
 * 会话类型
 * - review: 到期复习
 * - learn: 新卡学习
 * - weak_focus: 薄弱项强化
 */
export type SessionType = 'review' | 'learn' | 'weak_focus';

/**
 * 会话状态
 */
export type SessionStatus = 'CREATED' | 'ACTIVE' | 'COMPLETED' | 'CANCELLED';

/**
 * 难度标签（展示层使用）
 */
export type DifficultyLabel = 'New' | 'Learning' | 'Review' | 'Hard' | 'Very Hard';

/**
 * 会话配置
 */
export interface SessionConfig {
  learnerId: ID;
  sessionType: SessionType;
  maxReviews: number;
  maxNewCards: number;
  /** 仅记录到会话记录中；评分使用参数存储中该学习者的 targetRetention */
  targetRetention: number;
  weakLapseThreshold: number;
}

/**
 * 持久化的会话记录
 */
export interface SessionRecord {
  id: ID;
  learnerId: ID;
  sessionType: SessionType;
  status: SessionStatus;
  startedAt: Date;
  endedAt: Date | null;
  durationSeconds: number | null;
  questionsReviewed: number;
  questionsCorrect: number;
  averageResponseTimeMs: number | null;
  retentionRate: number | null;
  targetRetention: number;
  maxItems: number;
}

/**
 * 会话进度（内存态）
 */
export interface SessionProgress {
  sessionId: ID;
  questionsTotal: number;
  questionsCompleted: number;
  questionsCorrect: number;
  questionsIncorrect: number;
  questionsSkipped: number;
  averageResponseTimeMs: number;
  currentRetentionRate: number;
  estimatedRemainingMinutes: number;
  elapsedMinutes: number;
  startedAt: Date;
}

/**
 * 呈现给学习者的题目
 */
export interface ItemPresentation {
  card: CardState;
  itemId: ID;
  questionNumber: number;
  totalQuestions: number;
  category: string | null;
  difficultyLabel: DifficultyLabel;
  lastReviewAt: Date | null;
  /** 一天后的预测保持率 */
  predictedRetention: number;
  daysSinceLastReview: number | null;
}

/**
 * 会话总结
 */
export interface SessionSummary {
  sessionId: ID;
  questionsCompleted: number;
  accuracyPercentage: number;
  correctAnswers: number;
  incorrectAnswers: number;
  skipped: number;
  totalTimeMinutes: number;
  averageResponseTimeMs: number;
  retentionRate: number;
  completionRate: number;
}

/**
 * 单次答题结果
 */
export interface AnswerEvaluation {
  isCorrect: boolean;
  isSkipped: boolean;
  rating: Rating;
}
