/**
 * Event Bus - 调度领域事件总线
 *
 * 职责:
 * - 提供进程内事件发布/订阅机制
 * - 类型安全的事件系统
 * - 错误隔离（单个处理器失败不影响其他订阅者和发布者）
 *
 * 架构:
 * - 基于 EventEmitter 实现进程内通信
 * - 实现 NotificationSink 接口，供复习服务在评分成功后通知
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { Rating, SessionStatus, SessionType } from '@spaced/shared';
import { serviceLogger } from '../logger';

const logger = serviceLogger.child({ module: 'event-bus' });

// ==================== 事件 Payload 定义 ====================

/**
 * 卡片已调度事件载荷
 */
export interface CardScheduledPayload {
  cardId: string;
  itemId: string;
  learnerId: string;
  rating: Rating;
  responseTimeMs: number;
  sessionId?: string;
  difficulty: number;
  stability: number;
  retrievability: number;
  intervalDays: number;
  nextReviewAt: Date;
  timestamp: Date;
}

/**
 * 学习会话开始事件载荷
 */
export interface SessionStartedPayload {
  sessionId: string;
  learnerId: string;
  sessionType: SessionType;
  targetRetention: number;
  maxItems: number;
  questionsTotal: number;
  startedAt: Date;
}

/**
 * 学习会话结束事件载荷
 */
export interface SessionEndedPayload {
  sessionId: string;
  learnerId: string;
  status: Extract<SessionStatus, 'COMPLETED' | 'CANCELLED'>;
  durationSeconds: number;
  questionsReviewed: number;
  questionsCorrect: number;
  retentionRate: number;
  endedAt: Date;
}

// ==================== 事件类型联合 ====================

/**
 * 调度事件类型定义（类型安全的联合类型）
 */
export type SchedulingEvent =
  | { type: 'CARD_SCHEDULED'; payload: CardScheduledPayload }
  | { type: 'SESSION_STARTED'; payload: SessionStartedPayload }
  | { type: 'SESSION_ENDED'; payload: SessionEndedPayload };

export type SchedulingEventType = SchedulingEvent['type'];

export type PayloadOf<K extends SchedulingEventType> = Extract<SchedulingEvent, { type: K }>['payload'];

/**
 * 领域事件接口
 */
export interface DomainEvent<T = unknown> {
  type: SchedulingEventType;
  payload: T;
  timestamp: Date;
  correlationId: string;
}

/**
 * 事件处理器类型
 */
export type EventHandler<T> = (payload: T, event: DomainEvent<T>) => void | Promise<void>;

/**
 * 事件订阅配置
 */
export interface SubscriptionOptions {
  /** 订阅者 ID（用于管理订阅） */
  subscriberId?: string;
  /** 为 false 时 publish 等待该处理器完成（默认 true，不阻塞发布者） */
  async?: boolean;
  /** 错误处理器 */
  onError?: (error: unknown, event: DomainEvent) => void;
}

/**
 * 通知出口：复习服务只依赖该接口
 */
export interface NotificationSink {
  publish(event: SchedulingEvent): Promise<void>;
}

/**
 * 事件总线配置
 */
export interface EventBusConfig {
  /** 最大监听器数量 */
  maxListeners?: number;
}

// ==================== 事件总线实现 ====================

export class EventBus implements NotificationSink {
  private emitter: EventEmitter;
  private subscriptions = new Map<SchedulingEventType, Set<string>>();

  constructor(config: EventBusConfig = {}) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(config.maxListeners ?? 100);
  }

  /**
   * 发布事件
   *
   * 同步订阅者（async: false）执行完毕后才返回，异步订阅者不阻塞发布者
   */
  async publish(event: SchedulingEvent): Promise<void> {
    const domainEvent: DomainEvent = {
      type: event.type,
      payload: event.payload,
      timestamp: new Date(),
      correlationId: randomUUID(),
    };

    logger.debug(
      { type: event.type, correlationId: domainEvent.correlationId },
      'Publishing event',
    );

    const pending: Promise<void>[] = [];
    this.emitter.emit(event.type, domainEvent.payload, domainEvent, (task: Promise<void>) => {
      pending.push(task);
    });
    await Promise.all(pending);
  }

  /**
   * 订阅事件
   *
   * @returns 取消订阅函数
   */
  subscribe<K extends SchedulingEventType>(
    eventType: K,
    handler: EventHandler<PayloadOf<K>>,
    options: SubscriptionOptions = {},
  ): () => void {
    const { subscriberId = randomUUID(), async = true, onError } = options;

    const run = async (payload: PayloadOf<K>, event: DomainEvent<PayloadOf<K>>): Promise<void> => {
      try {
        await handler(payload, event);
      } catch (error) {
        logger.error({ error, eventType, subscriberId }, 'Event handler error');
        onError?.(error, event);
      }
    };

    // 错误在 run 内隔离；同步订阅者的任务交给 publish 等待
    const wrappedHandler = (
      payload: PayloadOf<K>,
      event: DomainEvent<PayloadOf<K>>,
      track: (task: Promise<void>) => void,
    ): void => {
      const task = run(payload, event);
      if (!async) {
        track(task);
      }
    };

    this.emitter.on(eventType, wrappedHandler);

    let subscribers = this.subscriptions.get(eventType);
    if (!subscribers) {
      subscribers = new Set();
      this.subscriptions.set(eventType, subscribers);
    }
    subscribers.add(subscriberId);

    logger.debug({ eventType, subscriberId }, 'Subscribed to event');

    return () => {
      this.emitter.off(eventType, wrappedHandler);
      this.subscriptions.get(eventType)?.delete(subscriberId);
      logger.debug({ eventType, subscriberId }, 'Unsubscribed from event');
    };
  }

  /**
   * 获取事件订阅者数量
   */
  getSubscriberCount(eventType: SchedulingEventType): number {
    return this.subscriptions.get(eventType)?.size ?? 0;
  }

  /**
   * 清除所有订阅
   */
  clearAllSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
    logger.info('Cleared all subscriptions');
  }
}
