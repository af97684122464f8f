/**
 * 复习调度服务
 *
 * 唯一允许修改卡片记忆状态的入口：
 * - 校验评分请求
 * - 在单个事务内读取卡片、运行记忆模型、写回状态并追加复习日志
 * - 提交后发布 CARD_SCHEDULED 事件，发布失败只记录日志
 */

import { randomUUID } from 'crypto';
import {
  Rating,
  ReviewRequestSchema,
  type CardState,
  type ReviewRecord,
} from '@spaced/shared';
import {
  NotFoundError,
  NotificationError,
  ValidationError,
  toSchedulingError,
} from '../core/errors';
import type { NotificationSink } from '../core/event-bus';
import { fail, ok, type ServiceResult } from '../core/result';
import { createChildLogger } from '../logger';
import { classifyReview, currentRetrievability, derivePhase, scheduleNext } from '../memory';
import type { SchedulingStore } from '../repositories';
import type { ParameterStore } from './parameter-store.service';

const logger = createChildLogger({ module: 'review-service' });

/**
 * 一次评分的结果：写入后的卡片与对应的复习日志
 */
export interface ReviewOutcome {
  card: CardState;
  record: ReviewRecord;
}

/**
 * 评分请求，rating 在校验前可以是任意数值
 */
export interface ReviewRequestInput {
  cardId: string;
  rating: number;
  responseTimeMs: number;
  sessionId?: string;
}

export interface ReviewServiceDeps {
  store: SchedulingStore;
  parameters: ParameterStore;
  notifier: NotificationSink;
}

export class ReviewService {
  private readonly store: SchedulingStore;
  private readonly parameters: ParameterStore;
  private readonly notifier: NotificationSink;

  constructor(deps: ReviewServiceDeps) {
    this.store = deps.store;
    this.parameters = deps.parameters;
    this.notifier = deps.notifier;
  }

  /**
   * 对卡片评分并调度下次复习
   *
   * 状态更新与日志追加要么同时生效，要么都不生效
   */
  async scheduleReview(request: ReviewRequestInput): Promise<ServiceResult<ReviewOutcome>> {
    const parsed = ReviewRequestSchema.safeParse(request);
    if (!parsed.success) {
      const error = ValidationError.fromZod(parsed.error);
      logger.warn({ cardId: request.cardId, reason: error.message }, '[ReviewService] 评分请求无效');
      return fail(error);
    }

    const { cardId, rating, responseTimeMs, sessionId } = parsed.data;
    const now = new Date();

    let outcome: ReviewOutcome;
    try {
      outcome = this.store.transaction(() =>
        this.applyReview(cardId, rating, responseTimeMs, sessionId ?? null, now),
      );
    } catch (error) {
      const failure = toSchedulingError(error, '复习调度失败');
      logger.error({ err: failure, cardId }, '[ReviewService] 评分失败，事务已回滚');
      return fail(failure);
    }

    logger.info(
      {
        cardId,
        rating,
        stability: outcome.card.stability,
        intervalDays: outcome.record.intervalDays,
      },
      '[ReviewService] 卡片已调度',
    );

    await this.notifyScheduled(outcome, responseTimeMs, sessionId);

    return ok(outcome);
  }

  /**
   * 事务内执行：读取、计算、写回、追加日志
   */
  private applyReview(
    cardId: string,
    rating: Rating,
    responseTimeMs: number,
    sessionId: string | null,
    now: Date,
  ): ReviewOutcome {
    const before = this.store.cards.getById(cardId);
    if (!before) {
      throw new NotFoundError('Card', cardId);
    }

    const parameters = this.parameters.getActiveParameters(before.learnerId);
    const retrievabilityBefore = currentRetrievability(before, now);

    const next = scheduleNext(
      {
        difficulty: before.difficulty,
        stability: before.stability,
        retrievability: retrievabilityBefore,
        phase: before.phase,
      },
      rating,
      parameters,
      now,
    );

    const isLapse = rating === Rating.AGAIN;
    const reviewCount = before.reviewCount + 1;

    const after: CardState = {
      ...before,
      difficulty: next.difficulty,
      stability: next.stability,
      retrievability: next.retrievability,
      phase: derivePhase(rating, reviewCount),
      reviewCount,
      lapseCount: isLapse ? before.lapseCount + 1 : before.lapseCount,
      successCount: isLapse ? before.successCount : before.successCount + 1,
      lastReviewAt: now,
      nextReviewAt: next.nextReviewAt,
      updatedAt: now,
    };

    const record: ReviewRecord = {
      id: randomUUID(),
      cardId: before.id,
      itemId: before.itemId,
      rating,
      responseTimeMs,
      difficultyBefore: before.difficulty,
      stabilityBefore: before.stability,
      retrievabilityBefore,
      difficultyAfter: after.difficulty,
      stabilityAfter: after.stability,
      retrievabilityAfter: after.retrievability,
      intervalDays: next.intervalDays,
      sessionId,
      reviewType: classifyReview(before.phase, before.lapseCount),
      reviewedAt: now,
    };

    this.store.cards.upsert(after);
    this.store.history.append(record);

    return { card: after, record };
  }

  /**
   * 发布调度事件（失败不影响评分结果）
   */
  private async notifyScheduled(
    outcome: ReviewOutcome,
    responseTimeMs: number,
    sessionId: string | undefined,
  ): Promise<void> {
    const { card, record } = outcome;
    try {
      await this.notifier.publish({
        type: 'CARD_SCHEDULED',
        payload: {
          cardId: card.id,
          itemId: card.itemId,
          learnerId: card.learnerId,
          rating: record.rating,
          responseTimeMs,
          sessionId,
          difficulty: card.difficulty,
          stability: card.stability,
          retrievability: card.retrievability,
          intervalDays: record.intervalDays,
          nextReviewAt: card.nextReviewAt,
          timestamp: record.reviewedAt,
        },
      });
    } catch (error) {
      const failure = new NotificationError('CARD_SCHEDULED', { cause: error });
      logger.warn({ err: failure, cardId: card.id }, '[ReviewService] 调度事件发布失败');
    }
  }
}
