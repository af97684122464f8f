/**
 * 调度核心装配
 *
 * 打开存储、创建事件总线并连接各服务
 */

import type { Database as DatabaseType } from 'better-sqlite3';
import { openDatabase } from './config/database';
import { env } from './config/env';
import { EventBus, type NotificationSink } from './core/event-bus';
import { startupLogger } from './logger';
import {
  SqliteSchedulingStore,
  createReadOnlyView,
  type ReadOnlySchedulingView,
  type SchedulingStore,
} from './repositories';
import {
  CardService,
  ParameterStore,
  ReviewService,
  SessionOrchestrator,
  SessionRegistry,
  type SessionDefaults,
} from './services';

export interface SchedulingCoreOptions {
  /** 已打开的连接；未提供时按 databasePath 打开 */
  database?: DatabaseType;
  /** 默认取 DATABASE_PATH */
  databasePath?: string;
  /** 替换默认的事件总线 */
  notifier?: NotificationSink;
  sessionDefaults?: Partial<SessionDefaults>;
}

export interface SchedulingCore {
  readonly store: SchedulingStore;
  readonly events: EventBus;
  readonly parameters: ParameterStore;
  readonly reviews: ReviewService;
  readonly sessions: SessionOrchestrator;
  readonly cards: CardService;
  /** 供下游分析使用的只读视图 */
  readonly view: ReadOnlySchedulingView;
  /** 未指定学习者时使用的 ID */
  readonly defaultLearnerId: string;
  close(): void;
}

/**
 * 创建调度核心
 * 已保存的算法参数在此处全部校验，损坏时抛出 ConfigurationError
 */
export function createSchedulingCore(options: SchedulingCoreOptions = {}): SchedulingCore {
  const db =
    options.database ??
    openDatabase({
      path: options.databasePath ?? env.DATABASE_PATH,
      journalMode: env.SQLITE_JOURNAL_MODE,
      busyTimeout: env.SQLITE_BUSY_TIMEOUT_MS,
    });

  const store = new SqliteSchedulingStore(db);
  const events = new EventBus();
  const notifier = options.notifier ?? events;
  const parameters = new ParameterStore(store.parameters);
  try {
    parameters.initialize();
  } catch (error) {
    if (!options.database) {
      db.close();
    }
    throw error;
  }

  const reviews = new ReviewService({ store, parameters, notifier });
  const sessions = new SessionOrchestrator({
    store,
    reviewService: reviews,
    notifier,
    registry: new SessionRegistry(),
    defaults: {
      maxReviews: env.SESSION_MAX_REVIEWS,
      maxNewCards: env.SESSION_MAX_NEW_CARDS,
      weakLapseThreshold: env.WEAK_FOCUS_LAPSE_THRESHOLD,
      ...options.sessionDefaults,
    },
  });

  startupLogger.info('[SchedulingCore] 调度核心已就绪');

  return {
    store,
    events,
    parameters,
    reviews,
    sessions,
    cards: new CardService(store),
    view: createReadOnlyView(store),
    defaultLearnerId: env.DEFAULT_LEARNER_ID,
    close() {
      events.clearAllSubscriptions();
      db.close();
    },
  };
}
