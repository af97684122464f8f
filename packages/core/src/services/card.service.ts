/**
 * 卡片服务
 * 学习项登记、进度重置、学习统计与保持率预测
 */

import { randomUUID } from 'crypto';
import { Rating, type CardState, type ID, type LearningStats } from '@spaced/shared';
import { NotFoundError, toSchedulingError } from '../core/errors';
import { fail, ok, type ServiceResult } from '../core/result';
import { createChildLogger } from '../logger';
import { MS_PER_DAY, predictRetention } from '../memory';
import type { SchedulingStore } from '../repositories';

const logger = createChildLogger({ module: 'card-service' });

/** 新卡初始状态 */
export const INITIAL_DIFFICULTY = 5;
export const INITIAL_STABILITY = 1;

/** 统计保持率的回看天数 */
const RETENTION_WINDOW_DAYS = 30;

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export class CardService {
  constructor(private readonly store: SchedulingStore) {}

  /**
   * 为学习者登记学习项，已登记时返回已有卡片
   */
  async enrollItem(learnerId: ID, itemId: ID): Promise<ServiceResult<CardState>> {
    try {
      const card = this.store.transaction(() => this.ensureCard(learnerId, itemId, new Date()).card);
      return ok(card);
    } catch (error) {
      const failure = toSchedulingError(error, '登记学习项失败');
      logger.warn({ err: failure, learnerId, itemId }, '[CardService] 登记学习项失败');
      return fail(failure);
    }
  }

  /**
   * 批量登记，返回新建的卡片数
   */
  async enrollItems(learnerId: ID, itemIds: ID[]): Promise<ServiceResult<number>> {
    try {
      const now = new Date();
      const created = this.store.transaction(
        () => itemIds.filter((itemId) => this.ensureCard(learnerId, itemId, now).created).length,
      );
      logger.info({ learnerId, created, requested: itemIds.length }, '[CardService] 批量登记完成');
      return ok(created);
    } catch (error) {
      const failure = toSchedulingError(error, '批量登记学习项失败');
      logger.warn({ err: failure, learnerId }, '[CardService] 批量登记失败');
      return fail(failure);
    }
  }

  /**
   * 重置学习者进度：删除其全部卡片，复习日志保留
   */
  async resetProgress(learnerId: ID): Promise<ServiceResult<number>> {
    try {
      const removed = this.store.transaction(() => this.store.cards.deleteByLearner(learnerId));
      logger.info({ learnerId, removed }, '[CardService] 学习进度已重置');
      return ok(removed);
    } catch (error) {
      const failure = toSchedulingError(error, '重置学习进度失败');
      logger.error({ err: failure, learnerId }, '[CardService] 重置学习进度失败');
      return fail(failure);
    }
  }

  /**
   * 学习统计
   */
  async getLearningStats(learnerId: ID): Promise<ServiceResult<LearningStats>> {
    const now = new Date();
    try {
      const cards = this.store.cards.listByLearner(learnerId);
      const since = new Date(now.getTime() - RETENTION_WINDOW_DAYS * MS_PER_DAY);
      const recent = this.store.history.listRecentByLearner(learnerId, since);

      const nowMs = now.getTime();
      const reviewed = cards.filter((card) => card.reviewCount > 0);
      const recalled = recent.filter((record) => record.rating >= Rating.GOOD).length;

      return ok({
        totalCards: cards.length,
        newCards: cards.filter((card) => card.phase === 'NEW').length,
        learningCards: cards.filter((card) => card.phase === 'LEARNING').length,
        reviewCards: cards.filter((card) => card.phase === 'REVIEW').length,
        dueCards: cards.filter((card) => card.nextReviewAt.getTime() <= nowMs).length,
        overdueCards: cards.filter((card) => nowMs - card.nextReviewAt.getTime() > MS_PER_DAY).length,
        averageDifficulty: average(reviewed.map((card) => card.difficulty)),
        averageStability: average(reviewed.map((card) => card.stability)),
        retentionRate: recent.length > 0 ? recalled / recent.length : 0,
      });
    } catch (error) {
      return fail(toSchedulingError(error, '读取学习统计失败'));
    }
  }

  /**
   * 预测卡片 daysAhead 天后的保持率
   */
  async predictRetention(cardId: ID, daysAhead: number = 1): Promise<ServiceResult<number>> {
    const card = this.store.cards.getById(cardId);
    if (!card) {
      return fail(new NotFoundError('Card', cardId));
    }
    return ok(predictRetention(card.stability, daysAhead));
  }

  private ensureCard(learnerId: ID, itemId: ID, now: Date): { card: CardState; created: boolean } {
    const existing = this.store.cards.getByLearnerAndItem(learnerId, itemId);
    if (existing) {
      return { card: existing, created: false };
    }
    if (!this.store.items.getById(itemId)) {
      throw new NotFoundError('StudyItem', itemId);
    }

    const card: CardState = {
      id: randomUUID(),
      learnerId,
      itemId,
      difficulty: INITIAL_DIFFICULTY,
      stability: INITIAL_STABILITY,
      retrievability: 1,
      phase: 'NEW',
      reviewCount: 0,
      lapseCount: 0,
      successCount: 0,
      lastReviewAt: null,
      nextReviewAt: now,
      createdAt: now,
      updatedAt: now,
    };
    this.store.cards.insert(card);
    return { card, created: true };
  }
}
