/**
 * 学习会话编排服务
 *
 * 会话状态机: CREATED -> ACTIVE -> COMPLETED | CANCELLED
 * - 按会话类型挑选候选卡片
 * - 逐题呈现、判定作答并委托复习服务评分
 * - 维护内存中的会话进度，结束时写回会话记录并生成总结
 */

import { randomUUID } from 'crypto';
import {
  Rating,
  SessionConfigSchema,
  SubmitAnswerSchema,
  type AnswerEvaluation,
  type CardState,
  type ID,
  type ItemPresentation,
  type SessionConfig,
  type SessionProgress,
  type SessionRecord,
  type SessionSummary,
  type SessionType,
  type StudyItem,
} from '@spaced/shared';
import { NotFoundError, NotificationError, ValidationError, toSchedulingError } from '../core/errors';
import type { NotificationSink, SchedulingEvent } from '../core/event-bus';
import { fail, ok, type ServiceResult } from '../core/result';
import { createChildLogger } from '../logger';
import { MS_PER_DAY, predictRetention } from '../memory';
import type { SchedulingStore } from '../repositories';
import { difficultyLabel, evaluateAnswer } from './answer-evaluation';
import type { ReviewOutcome, ReviewService } from './review.service';
import { SessionRegistry, type ActiveSession } from './session-registry';

const logger = createChildLogger({ module: 'session-orchestrator' });

/** 每题预估耗时（分钟） */
const MINUTES_PER_QUESTION = 0.5;

/**
 * 会话默认设置
 */
export interface SessionDefaults {
  maxReviews: number;
  maxNewCards: number;
  /** 写入会话记录；卡片调度使用 ParameterStore 中的目标保持率 */
  targetRetention: number;
  weakLapseThreshold: number;
}

export const DEFAULT_SESSION_SETTINGS: Readonly<SessionDefaults> = Object.freeze({
  maxReviews: 50,
  maxNewCards: 20,
  targetRetention: 0.9,
  weakLapseThreshold: 3,
});

/**
 * 开始会话的输入，未给出的字段取默认设置
 */
export interface StartSessionInput extends Partial<SessionDefaults> {
  learnerId: ID;
  sessionType: SessionType;
}

export interface SessionStart {
  sessionId: ID;
  items: ItemPresentation[];
  progress: SessionProgress;
}

export interface AnswerOutcome extends AnswerEvaluation {
  review: ReviewOutcome;
  progress: SessionProgress;
}

export interface SessionOrchestratorDeps {
  store: SchedulingStore;
  reviewService: ReviewService;
  notifier: NotificationSink;
  registry?: SessionRegistry;
  defaults?: Partial<SessionDefaults>;
}

function roundToOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

export class SessionOrchestrator {
  private readonly store: SchedulingStore;
  private readonly reviewService: ReviewService;
  private readonly notifier: NotificationSink;
  private readonly registry: SessionRegistry;
  private readonly defaults: SessionDefaults;

  constructor(deps: SessionOrchestratorDeps) {
    this.store = deps.store;
    this.reviewService = deps.reviewService;
    this.notifier = deps.notifier;
    this.registry = deps.registry ?? new SessionRegistry();
    this.defaults = { ...DEFAULT_SESSION_SETTINGS, ...deps.defaults };
  }

  /**
   * 开始学习会话
   */
  async startSession(input: StartSessionInput): Promise<ServiceResult<SessionStart>> {
    const parsed = SessionConfigSchema.safeParse({ ...this.defaults, ...input });
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error));
    }

    const config: SessionConfig = parsed.data;
    const now = new Date();
    const maxItems = config.sessionType === 'learn' ? config.maxNewCards : config.maxReviews;

    let session: ActiveSession;
    try {
      session = this.store.transaction(() => {
        const record: SessionRecord = {
          id: randomUUID(),
          learnerId: config.learnerId,
          sessionType: config.sessionType,
          status: 'CREATED',
          startedAt: now,
          endedAt: null,
          durationSeconds: null,
          questionsReviewed: 0,
          questionsCorrect: 0,
          averageResponseTimeMs: null,
          retentionRate: null,
          targetRetention: config.targetRetention,
          maxItems,
        };
        this.store.sessions.create(record);

        const candidateIds = this.selectCandidates(config, now).map((card) => card.id);

        const active: SessionRecord = { ...record, status: 'ACTIVE' };
        this.store.sessions.update(active);

        return {
          record: active,
          config,
          candidateIds,
          answeredIds: new Set<ID>(),
          progress: {
            sessionId: record.id,
            questionsTotal: candidateIds.length,
            questionsCompleted: 0,
            questionsCorrect: 0,
            questionsIncorrect: 0,
            questionsSkipped: 0,
            averageResponseTimeMs: 0,
            currentRetentionRate: 0,
            estimatedRemainingMinutes: Math.max(
              1,
              Math.floor(candidateIds.length * MINUTES_PER_QUESTION),
            ),
            elapsedMinutes: 0,
            startedAt: now,
          },
        };
      });
    } catch (error) {
      const failure = toSchedulingError(error, '创建学习会话失败');
      logger.error({ err: failure, learnerId: config.learnerId }, '[SessionOrchestrator] 创建会话失败');
      return fail(failure);
    }

    this.registry.register(session);

    const items: ItemPresentation[] = [];
    for (const cardId of session.candidateIds) {
      const presentation = this.present(session, cardId, items.length + 1, now);
      if (presentation) {
        items.push(presentation);
      }
    }

    logger.info(
      {
        sessionId: session.record.id,
        learnerId: config.learnerId,
        sessionType: config.sessionType,
        questionsTotal: session.progress.questionsTotal,
      },
      '[SessionOrchestrator] 会话已开始',
    );

    await this.publishSafely({
      type: 'SESSION_STARTED',
      payload: {
        sessionId: session.record.id,
        learnerId: config.learnerId,
        sessionType: config.sessionType,
        targetRetention: config.targetRetention,
        maxItems,
        questionsTotal: session.progress.questionsTotal,
        startedAt: now,
      },
    });

    return ok({ sessionId: session.record.id, items, progress: { ...session.progress } });
  }

  /**
   * 获取下一道未作答的题目，会话完成后返回 null
   */
  async getNextItem(sessionId: ID): Promise<ServiceResult<ItemPresentation | null>> {
    const session = this.registry.get(sessionId);
    if (!session) {
      return fail(new NotFoundError('Session', sessionId));
    }

    const { progress } = session;
    if (progress.questionsCompleted >= progress.questionsTotal) {
      return ok(null);
    }

    const now = new Date();
    for (const cardId of session.candidateIds) {
      if (session.answeredIds.has(cardId)) {
        continue;
      }
      const presentation = this.present(session, cardId, progress.questionsCompleted + 1, now);
      if (presentation) {
        return ok(presentation);
      }
    }

    return ok(null);
  }

  /**
   * 提交答案
   *
   * 只有评分成功后才更新会话进度
   */
  async submitAnswer(
    sessionId: ID,
    cardId: ID,
    answer: string | null,
    responseTimeMs: number,
    rating?: number,
  ): Promise<ServiceResult<AnswerOutcome>> {
    const parsed = SubmitAnswerSchema.safeParse({
      sessionId,
      cardId,
      answer,
      responseTimeMs,
      rating,
    });
    if (!parsed.success) {
      return fail(ValidationError.fromZod(parsed.error));
    }

    const session = this.registry.get(sessionId);
    if (!session) {
      return fail(new NotFoundError('Session', sessionId));
    }

    const card = this.store.cards.getById(cardId);
    if (!card || card.learnerId !== session.record.learnerId) {
      logger.warn({ sessionId, cardId }, '[SessionOrchestrator] 卡片不存在或不属于该学习者');
      return fail(new NotFoundError('Card', cardId));
    }

    // 只接受本会话中尚未作答的候选卡片
    if (!session.candidateIds.includes(cardId)) {
      logger.warn({ sessionId, cardId }, '[SessionOrchestrator] 卡片不在本次会话中');
      return fail(new ValidationError(`卡片不在本次会话中: ${cardId}`, 'cardId'));
    }
    if (session.answeredIds.has(cardId)) {
      logger.warn({ sessionId, cardId }, '[SessionOrchestrator] 卡片已作答');
      return fail(new ValidationError(`卡片已在本次会话中作答: ${cardId}`, 'cardId'));
    }

    const item = this.store.items.getById(card.itemId);
    if (!item) {
      return fail(new NotFoundError('StudyItem', card.itemId));
    }

    const evaluation = evaluateAnswer(
      item.answer,
      parsed.data.answer,
      parsed.data.responseTimeMs,
      parsed.data.rating,
    );

    const result = await this.reviewService.scheduleReview({
      cardId,
      rating: evaluation.rating,
      responseTimeMs: parsed.data.responseTimeMs,
      sessionId,
    });
    if (!result.success) {
      return fail(result.error);
    }

    this.recordAnswer(session, cardId, evaluation, parsed.data.responseTimeMs);

    return ok({
      ...evaluation,
      review: result.data,
      progress: { ...session.progress },
    });
  }

  /**
   * 获取会话进度（刷新已用时间与剩余时间估计）
   */
  async getSessionProgress(sessionId: ID): Promise<ServiceResult<SessionProgress>> {
    const session = this.registry.get(sessionId);
    if (!session) {
      return fail(new NotFoundError('Session', sessionId));
    }

    this.refreshTiming(session.progress, new Date());
    return ok({ ...session.progress });
  }

  /**
   * 结束会话，写回会话记录并返回总结
   */
  async endSession(sessionId: ID): Promise<ServiceResult<SessionSummary>> {
    const session = this.registry.get(sessionId);
    if (!session) {
      return fail(new NotFoundError('Session', sessionId));
    }

    const now = new Date();
    const { progress } = session;
    this.refreshTiming(progress, now);

    let record: SessionRecord;
    try {
      record = this.store.transaction(() => {
        const reviews = this.store.history.listBySession(sessionId);
        const questionsCorrect = reviews.filter((review) => review.rating >= Rating.GOOD).length;
        const totalResponseMs = reviews.reduce((sum, review) => sum + review.responseTimeMs, 0);

        const finished: SessionRecord = {
          ...session.record,
          status: 'COMPLETED',
          endedAt: now,
          durationSeconds: Math.floor((now.getTime() - session.record.startedAt.getTime()) / 1000),
          questionsReviewed: reviews.length,
          questionsCorrect,
          averageResponseTimeMs: reviews.length > 0 ? Math.round(totalResponseMs / reviews.length) : null,
          retentionRate: progress.currentRetentionRate,
        };
        this.store.sessions.update(finished);
        return finished;
      });
    } catch (error) {
      const failure = toSchedulingError(error, '结束学习会话失败');
      logger.error({ err: failure, sessionId }, '[SessionOrchestrator] 结束会话失败');
      return fail(failure);
    }

    this.registry.release(sessionId);

    const summary: SessionSummary = {
      sessionId,
      questionsCompleted: progress.questionsCompleted,
      accuracyPercentage:
        progress.questionsCompleted > 0
          ? roundToOneDecimal((progress.questionsCorrect / progress.questionsCompleted) * 100)
          : 0,
      correctAnswers: progress.questionsCorrect,
      incorrectAnswers: progress.questionsIncorrect,
      skipped: progress.questionsSkipped,
      totalTimeMinutes: progress.elapsedMinutes,
      averageResponseTimeMs: progress.averageResponseTimeMs,
      retentionRate: progress.currentRetentionRate,
      completionRate:
        progress.questionsTotal > 0
          ? roundToOneDecimal((progress.questionsCompleted / progress.questionsTotal) * 100)
          : 0,
    };

    logger.info(
      {
        sessionId,
        questionsCompleted: summary.questionsCompleted,
        accuracyPercentage: summary.accuracyPercentage,
      },
      '[SessionOrchestrator] 会话已结束',
    );

    await this.publishEnded(record);

    return ok(summary);
  }

  /**
   * 取消会话，不生成总结
   */
  async cancelSession(sessionId: ID): Promise<ServiceResult<void>> {
    const session = this.registry.get(sessionId);
    if (!session) {
      return fail(new NotFoundError('Session', sessionId));
    }

    const now = new Date();
    const { progress } = session;
    const record: SessionRecord = {
      ...session.record,
      status: 'CANCELLED',
      endedAt: now,
      durationSeconds: Math.floor((now.getTime() - session.record.startedAt.getTime()) / 1000),
      questionsReviewed: progress.questionsCompleted,
      questionsCorrect: progress.questionsCorrect,
      averageResponseTimeMs: progress.questionsCompleted > 0 ? progress.averageResponseTimeMs : null,
      retentionRate: progress.currentRetentionRate,
    };

    try {
      this.store.sessions.update(record);
    } catch (error) {
      const failure = toSchedulingError(error, '取消学习会话失败');
      logger.error({ err: failure, sessionId }, '[SessionOrchestrator] 取消会话失败');
      return fail(failure);
    }

    this.registry.release(sessionId);
    logger.info({ sessionId }, '[SessionOrchestrator] 会话已取消');

    await this.publishEnded(record);

    return ok(undefined);
  }

  // ==================== 私有方法 ====================

  private selectCandidates(config: SessionConfig, now: Date): CardState[] {
    // 学习项缺失的卡片无法判定答案，直接跳过
    return this.queryPool(config, now).filter((card) => this.store.items.getById(card.itemId) !== null);
  }

  private queryPool(config: SessionConfig, now: Date): CardState[] {
    const { cards } = this.store;
    switch (config.sessionType) {
      case 'review':
        return cards.queryDue(config.learnerId, now, config.maxReviews);
      case 'learn':
        return cards.queryNew(config.learnerId, config.maxNewCards);
      case 'weak_focus':
        return cards.queryWeak(config.learnerId, config.weakLapseThreshold, config.maxReviews);
    }
  }

  /**
   * 从仓库重新读取卡片并生成呈现数据
   */
  private present(
    session: ActiveSession,
    cardId: ID,
    questionNumber: number,
    now: Date,
  ): ItemPresentation | null {
    const card = this.store.cards.getById(cardId);
    if (!card) {
      return null;
    }
    const item: StudyItem | null = this.store.items.getById(card.itemId);
    if (!item) {
      return null;
    }

    return {
      card,
      itemId: card.itemId,
      questionNumber,
      totalQuestions: session.progress.questionsTotal,
      category: item.category,
      difficultyLabel: difficultyLabel(card),
      lastReviewAt: card.lastReviewAt,
      predictedRetention: predictRetention(card.stability),
      daysSinceLastReview: card.lastReviewAt
        ? Math.floor((now.getTime() - card.lastReviewAt.getTime()) / MS_PER_DAY)
        : null,
    };
  }

  private recordAnswer(
    session: ActiveSession,
    cardId: ID,
    evaluation: AnswerEvaluation,
    responseTimeMs: number,
  ): void {
    const { progress } = session;
    session.answeredIds.add(cardId);

    progress.questionsCompleted += 1;
    if (evaluation.isSkipped) {
      progress.questionsSkipped += 1;
    } else if (evaluation.isCorrect) {
      progress.questionsCorrect += 1;
    } else {
      progress.questionsIncorrect += 1;
    }

    // 增量均值
    const previousTotal = progress.averageResponseTimeMs * (progress.questionsCompleted - 1);
    progress.averageResponseTimeMs = Math.floor(
      (previousTotal + responseTimeMs) / progress.questionsCompleted,
    );

    const answered = progress.questionsCompleted - progress.questionsSkipped;
    progress.currentRetentionRate = answered > 0 ? progress.questionsCorrect / answered : 0;
  }

  private refreshTiming(progress: SessionProgress, now: Date): void {
    const elapsedSeconds = (now.getTime() - progress.startedAt.getTime()) / 1000;
    progress.elapsedMinutes = Math.floor(elapsedSeconds / 60);

    if (progress.questionsCompleted > 0) {
      const minutesPerQuestion = progress.elapsedMinutes / progress.questionsCompleted;
      const remaining = progress.questionsTotal - progress.questionsCompleted;
      progress.estimatedRemainingMinutes = Math.max(0, Math.floor(minutesPerQuestion * remaining));
    }
  }

  private async publishEnded(record: SessionRecord): Promise<void> {
    if (record.status !== 'COMPLETED' && record.status !== 'CANCELLED') {
      return;
    }
    await this.publishSafely({
      type: 'SESSION_ENDED',
      payload: {
        sessionId: record.id,
        learnerId: record.learnerId,
        status: record.status,
        durationSeconds: record.durationSeconds ?? 0,
        questionsReviewed: record.questionsReviewed,
        questionsCorrect: record.questionsCorrect,
        retentionRate: record.retentionRate ?? 0,
        endedAt: record.endedAt ?? new Date(),
      },
    });
  }

  private async publishSafely(event: SchedulingEvent): Promise<void> {
    try {
      await this.notifier.publish(event);
    } catch (error) {
      const failure = new NotificationError(event.type, { cause: error });
      logger.warn({ err: failure }, '[SessionOrchestrator] 会话事件发布失败');
    }
  }
}
