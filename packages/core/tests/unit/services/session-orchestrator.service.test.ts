/**
 * SessionOrchestrator 单元测试
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Rating } from '@spaced/shared';
import { ConfigurationError, NotFoundError, ValidationError } from '../../../src/core/errors';
import { SessionOrchestrator, SessionRegistry } from '../../../src/services';
import { DAY_MS, LEARNER_ID, OTHER_LEARNER_ID, T0, seedCard } from '../../helpers/fixtures';
import { createServices, type ServiceContext } from '../../helpers/services';

const MINUTE_MS = 60_000;

function seedCards(ctx: ServiceContext, count: number): void {
  for (let i = 1; i <= count; i++) {
    seedCard(ctx.store, { id: `card-${i}`, itemId: `item-${i}` });
  }
}

async function startReviewSession(ctx: ServiceContext): Promise<string> {
  const started = await ctx.sessions.startSession({ learnerId: LEARNER_ID, sessionType: 'review' });
  if (!started.success) {
    throw started.error;
  }
  return started.data.sessionId;
}

describe('SessionOrchestrator', () => {
  let ctx: ServiceContext;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    ctx = createServices();
  });

  afterEach(() => {
    ctx.db.close();
    vi.useRealTimers();
  });

  describe('startSession', () => {
    it('review 会话选出到期卡片并生成呈现数据', async () => {
      seedCards(ctx, 3);

      const result = await ctx.sessions.startSession({ learnerId: LEARNER_ID, sessionType: 'review' });

      expect(result.success).toBe(true);
      if (!result.success) return;

      const { items, progress, sessionId } = result.data;
      expect(items.map((item) => item.card.id)).toEqual(['card-1', 'card-2', 'card-3']);
      expect(items.map((item) => item.questionNumber)).toEqual([1, 2, 3]);
      expect(items[0]).toMatchObject({
        itemId: 'item-1',
        totalQuestions: 3,
        category: 'networking',
        difficultyLabel: 'New',
        lastReviewAt: null,
        daysSinceLastReview: null,
      });
      expect(items[0].predictedRetention).toBeCloseTo(Math.exp(-1), 12);
      expect(progress.questionsTotal).toBe(3);
      expect(progress.estimatedRemainingMinutes).toBe(1);

      const record = ctx.store.sessions.getById(sessionId);
      expect(record?.status).toBe('ACTIVE');
      expect(record?.maxItems).toBe(50);
      expect(record?.targetRetention).toBe(0.9);
      expect(ctx.notifier.events.map((event) => event.type)).toEqual(['SESSION_STARTED']);
    });

    it('learn 会话只选未复习的卡片并受 maxNewCards 限制', async () => {
      seedCards(ctx, 3);
      seedCard(ctx.store, {
        id: 'seen',
        itemId: 'item-seen',
        reviewCount: 2,
        phase: 'LEARNING',
        lastReviewAt: new Date(T0.getTime() - DAY_MS),
      });

      const result = await ctx.sessions.startSession({
        learnerId: LEARNER_ID,
        sessionType: 'learn',
        maxNewCards: 2,
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.items.map((item) => item.card.id)).toEqual(['card-1', 'card-2']);
      expect(ctx.store.sessions.getById(result.data.sessionId)?.maxItems).toBe(2);
    });

    it('weak_focus 会话按遗忘次数降序选出达到阈值的卡片', async () => {
      seedCard(ctx.store, { id: 'lapse-2', itemId: 'item-a', reviewCount: 4, lapseCount: 2 });
      seedCard(ctx.store, { id: 'lapse-3', itemId: 'item-b', reviewCount: 6, lapseCount: 3 });
      seedCard(ctx.store, { id: 'lapse-5', itemId: 'item-c', reviewCount: 9, lapseCount: 5 });

      const result = await ctx.sessions.startSession({ learnerId: LEARNER_ID, sessionType: 'weak_focus' });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.items.map((item) => item.card.id)).toEqual(['lapse-5', 'lapse-3']);
      expect(result.data.items.map((item) => item.difficultyLabel)).toEqual(['Very Hard', 'Hard']);
    });

    it('没有候选卡片时会话可以立即结束', async () => {
      const result = await ctx.sessions.startSession({ learnerId: LEARNER_ID, sessionType: 'learn' });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.items).toEqual([]);
      expect(result.data.progress.estimatedRemainingMinutes).toBe(1);

      const next = await ctx.sessions.getNextItem(result.data.sessionId);
      expect(next).toEqual({ success: true, data: null });

      const ended = await ctx.sessions.endSession(result.data.sessionId);
      expect(ended.success).toBe(true);
      if (!ended.success) return;
      expect(ended.data.completionRate).toBe(0);
      expect(ended.data.accuracyPercentage).toBe(0);
    });

    it('非法配置返回 ValidationError', async () => {
      const result = await ctx.sessions.startSession({
        learnerId: LEARNER_ID,
        sessionType: 'review',
        maxReviews: 0,
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
    });
  });

  describe('getNextItem', () => {
    it('每次从仓库重新读取卡片状态', async () => {
      seedCards(ctx, 2);
      const sessionId = await startReviewSession(ctx);

      await ctx.reviews.scheduleReview({ cardId: 'card-1', rating: Rating.GOOD, responseTimeMs: 4000 });

      const next = await ctx.sessions.getNextItem(sessionId);
      expect(next.success).toBe(true);
      if (!next.success || !next.data) return;
      expect(next.data.card.id).toBe('card-1');
      expect(next.data.card.reviewCount).toBe(1);
      expect(next.data.difficultyLabel).toBe('Learning');
      expect(next.data.daysSinceLastReview).toBe(0);
    });

    it('跳过已作答的卡片并递增题号', async () => {
      seedCards(ctx, 2);
      const sessionId = await startReviewSession(ctx);

      await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 4000);
      const next = await ctx.sessions.getNextItem(sessionId);

      expect(next.success).toBe(true);
      if (!next.success || !next.data) return;
      expect(next.data.card.id).toBe('card-2');
      expect(next.data.questionNumber).toBe(2);
    });

    it('呈现上次复习以来的整天数', async () => {
      seedCard(ctx.store, {
        reviewCount: 4,
        lapseCount: 3,
        phase: 'REVIEW',
        lastReviewAt: new Date(T0.getTime() - 3.5 * DAY_MS),
        nextReviewAt: new Date(T0.getTime() - DAY_MS),
      });
      const sessionId = await startReviewSession(ctx);

      const next = await ctx.sessions.getNextItem(sessionId);
      expect(next.success).toBe(true);
      if (!next.success || !next.data) return;
      expect(next.data.daysSinceLastReview).toBe(3);
      expect(next.data.difficultyLabel).toBe('Hard');
    });
  });

  describe('submitAnswer', () => {
    it('5 道题全部在 2 秒内答对：全部推断为 Easy，保持率为 1', async () => {
      seedCards(ctx, 5);
      const sessionId = await startReviewSession(ctx);

      const ratings: Rating[] = [];
      for (;;) {
        const next = await ctx.sessions.getNextItem(sessionId);
        if (!next.success || !next.data) break;
        const answered = await ctx.sessions.submitAnswer(sessionId, next.data.card.id, 'B', 2000);
        if (!answered.success) throw answered.error;
        ratings.push(answered.data.rating);
      }

      expect(ratings).toEqual([Rating.EASY, Rating.EASY, Rating.EASY, Rating.EASY, Rating.EASY]);

      const progress = await ctx.sessions.getSessionProgress(sessionId);
      expect(progress.success).toBe(true);
      if (!progress.success) return;
      expect(progress.data.questionsCompleted).toBe(5);
      expect(progress.data.questionsCorrect).toBe(5);
      expect(progress.data.currentRetentionRate).toBe(1);
      expect(progress.data.averageResponseTimeMs).toBe(2000);

      const ended = await ctx.sessions.endSession(sessionId);
      expect(ended.success).toBe(true);
      if (!ended.success) return;
      expect(ended.data).toMatchObject({
        questionsCompleted: 5,
        correctAnswers: 5,
        accuracyPercentage: 100,
        completionRate: 100,
        retentionRate: 1,
      });

      const record = ctx.store.sessions.getById(sessionId);
      expect(record?.status).toBe('COMPLETED');
      expect(record?.questionsReviewed).toBe(5);
      expect(record?.questionsCorrect).toBe(5);
    });

    it('未知卡片返回 NotFoundError 且进度不变', async () => {
      seedCards(ctx, 2);
      const sessionId = await startReviewSession(ctx);
      const before = await ctx.sessions.getSessionProgress(sessionId);

      const result = await ctx.sessions.submitAnswer(sessionId, 'no-such-card', 'B', 1000);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(await ctx.sessions.getSessionProgress(sessionId)).toEqual(before);
      expect(ctx.store.history.listBySession(sessionId)).toEqual([]);
    });

    it('其他学习者的卡片视为不存在', async () => {
      seedCards(ctx, 1);
      seedCard(ctx.store, { id: 'foreign', itemId: 'item-1', learnerId: OTHER_LEARNER_ID });
      const sessionId = await startReviewSession(ctx);

      const result = await ctx.sessions.submitAnswer(sessionId, 'foreign', 'B', 1000);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(ctx.store.cards.getById('foreign')?.reviewCount).toBe(0);
    });

    it('负的响应时间返回 ValidationError', async () => {
      seedCards(ctx, 1);
      const sessionId = await startReviewSession(ctx);

      const result = await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', -5);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
    });

    it('按正确、错误、跳过分别计数并计算增量平均耗时', async () => {
      seedCards(ctx, 4);
      const sessionId = await startReviewSession(ctx);

      const correct = await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 1000);
      const wrong = await ctx.sessions.submitAnswer(sessionId, 'card-2', 'A', 5000);
      const skipped = await ctx.sessions.submitAnswer(sessionId, 'card-3', null, 9000);

      expect(correct.success && correct.data.rating).toBe(Rating.EASY);
      expect(wrong.success && wrong.data.rating).toBe(Rating.AGAIN);
      expect(skipped.success && skipped.data).toMatchObject({
        isSkipped: true,
        isCorrect: false,
        rating: Rating.AGAIN,
      });

      vi.setSystemTime(new Date(T0.getTime() + 6 * MINUTE_MS));
      const progress = await ctx.sessions.getSessionProgress(sessionId);
      expect(progress.success).toBe(true);
      if (!progress.success) return;
      expect(progress.data).toMatchObject({
        questionsTotal: 4,
        questionsCompleted: 3,
        questionsCorrect: 1,
        questionsIncorrect: 1,
        questionsSkipped: 1,
        averageResponseTimeMs: 5000,
        currentRetentionRate: 0.5,
        elapsedMinutes: 6,
        estimatedRemainingMinutes: 2,
      });

      const ended = await ctx.sessions.endSession(sessionId);
      expect(ended.success).toBe(true);
      if (!ended.success) return;
      expect(ended.data).toEqual({
        sessionId,
        questionsCompleted: 3,
        accuracyPercentage: 33.3,
        correctAnswers: 1,
        incorrectAnswers: 1,
        skipped: 1,
        totalTimeMinutes: 6,
        averageResponseTimeMs: 5000,
        retentionRate: 0.5,
        completionRate: 75,
      });

      const record = ctx.store.sessions.getById(sessionId);
      expect(record).toMatchObject({
        status: 'COMPLETED',
        durationSeconds: 360,
        questionsReviewed: 3,
        questionsCorrect: 1,
        averageResponseTimeMs: 5000,
        retentionRate: 0.5,
      });
    });

    it('全部跳过时保持率为 0', async () => {
      seedCards(ctx, 2);
      const sessionId = await startReviewSession(ctx);

      await ctx.sessions.submitAnswer(sessionId, 'card-1', null, 1000);
      const result = await ctx.sessions.submitAnswer(sessionId, 'card-2', null, 1000);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.progress.currentRetentionRate).toBe(0);
    });

    it('显式给出的评分优先于推断', async () => {
      seedCards(ctx, 1);
      const sessionId = await startReviewSession(ctx);

      const result = await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 1000, Rating.HARD);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.rating).toBe(Rating.HARD);
      expect(result.data.review.record.rating).toBe(Rating.HARD);
      expect(result.data.review.record.sessionId).toBe(sessionId);
    });

    it('重复作答同一张卡片返回 ValidationError，剩余候选仍会出题', async () => {
      seedCards(ctx, 3);
      const sessionId = await startReviewSession(ctx);
      await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 1000);
      const before = await ctx.sessions.getSessionProgress(sessionId);

      const second = await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 1000);
      const third = await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 1000);

      expect(second.success).toBe(false);
      expect(third.success).toBe(false);
      if (second.success) return;
      expect(second.error).toBeInstanceOf(ValidationError);
      expect(second.error.message).toBe('卡片已在本次会话中作答: card-1');
      expect(await ctx.sessions.getSessionProgress(sessionId)).toEqual(before);
      expect(ctx.store.cards.getById('card-1')?.reviewCount).toBe(1);
      expect(ctx.store.history.listBySession(sessionId)).toHaveLength(1);

      const next = await ctx.sessions.getNextItem(sessionId);
      expect(next.success).toBe(true);
      if (!next.success) return;
      expect(next.data?.card.id).toBe('card-2');
      expect(next.data?.questionNumber).toBe(2);
    });

    it('不在本次会话候选中的卡片返回 ValidationError', async () => {
      seedCards(ctx, 2);
      seedCard(ctx.store, {
        id: 'later',
        itemId: 'item-later',
        phase: 'REVIEW',
        reviewCount: 4,
        lastReviewAt: new Date(T0.getTime() - DAY_MS),
        nextReviewAt: new Date(T0.getTime() + 3 * DAY_MS),
      });
      const sessionId = await startReviewSession(ctx);
      const before = await ctx.sessions.getSessionProgress(sessionId);

      const result = await ctx.sessions.submitAnswer(sessionId, 'later', 'B', 1000);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe('卡片不在本次会话中: later');
      expect(ctx.store.cards.getById('later')?.reviewCount).toBe(4);
      expect(await ctx.sessions.getSessionProgress(sessionId)).toEqual(before);
    });

    it('会话中途写入损坏的算法参数时返回失败结果而不是抛出', async () => {
      seedCards(ctx, 1);
      const sessionId = await startReviewSession(ctx);
      const before = await ctx.sessions.getSessionProgress(sessionId);
      ctx.db
        .prepare(
          `INSERT INTO "algorithm_config" ("learner_id", "parameters", "target_retention", "maximum_interval_days", "updated_at")
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(LEARNER_ID, JSON.stringify([1, 2, 3]), 0.9, 36500, T0.getTime());

      const result = await ctx.sessions.submitAnswer(sessionId, 'card-1', 'x', 1000);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(await ctx.sessions.getSessionProgress(sessionId)).toEqual(before);
      expect(ctx.store.cards.getById('card-1')?.reviewCount).toBe(0);
    });
  });

  describe('会话生命周期', () => {
    it('结束后的会话不再接受操作', async () => {
      seedCards(ctx, 1);
      const sessionId = await startReviewSession(ctx);
      await ctx.sessions.endSession(sessionId);

      const answer = await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 1000);
      const next = await ctx.sessions.getNextItem(sessionId);
      const again = await ctx.sessions.endSession(sessionId);

      expect(answer.success).toBe(false);
      expect(next.success).toBe(false);
      expect(again.success).toBe(false);
      if (again.success) return;
      expect(again.error).toBeInstanceOf(NotFoundError);
      expect(ctx.registry.size).toBe(0);
    });

    it('结束会话时发布 SESSION_ENDED', async () => {
      const sessionId = await startReviewSession(ctx);
      await ctx.sessions.endSession(sessionId);

      const ended = ctx.notifier.events.find((event) => event.type === 'SESSION_ENDED');
      expect(ended?.payload).toMatchObject({ sessionId, status: 'COMPLETED', questionsReviewed: 0 });
    });

    it('取消会话释放注册表并记录 CANCELLED', async () => {
      seedCards(ctx, 2);
      const sessionId = await startReviewSession(ctx);
      await ctx.sessions.submitAnswer(sessionId, 'card-1', 'B', 1000);

      const result = await ctx.sessions.cancelSession(sessionId);

      expect(result.success).toBe(true);
      expect(ctx.registry.has(sessionId)).toBe(false);
      expect(ctx.store.sessions.getById(sessionId)).toMatchObject({
        status: 'CANCELLED',
        questionsReviewed: 1,
        questionsCorrect: 1,
      });
      const progress = await ctx.sessions.getSessionProgress(sessionId);
      expect(progress.success).toBe(false);
    });

    it('不同编排器实例的注册表互相独立', async () => {
      seedCards(ctx, 1);
      const sessionId = await startReviewSession(ctx);
      const other = new SessionOrchestrator({
        store: ctx.store,
        reviewService: ctx.reviews,
        notifier: ctx.notifier,
        registry: new SessionRegistry(),
      });

      const result = await other.getSessionProgress(sessionId);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(ctx.registry.has(sessionId)).toBe(true);
    });
  });
});
