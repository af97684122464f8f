/**
 * 仓库接口定义
 *
 * 调度核心只依赖这些接口，具体存储实现可替换
 * 所有写操作必须经由 SchedulingStore.transaction 包裹
 */

import type {
  CardState,
  ID,
  MemoryParameters,
  ReviewRecord,
  SessionRecord,
  StudyItem,
} from '@spaced/shared';

/**
 * 到期查询过滤条件
 */
export interface DueQueryFilters {
  /** 只返回这些分类下的学习项 */
  categories?: string[];
  /** 排除的卡片 */
  excludeCardIds?: ID[];
}

/**
 * 卡片状态仓库
 */
export interface CardRepository {
  getById(id: ID): CardState | null;
  getByLearnerAndItem(learnerId: ID, itemId: ID): CardState | null;
  insert(card: CardState): void;
  upsert(card: CardState): void;
  /**
   * 到期卡片，按 nextReviewAt 升序；从未复习的卡片无论时间都可入选
   */
  queryDue(learnerId: ID, now: Date, limit: number, filters?: DueQueryFilters): CardState[];
  queryNew(learnerId: ID, limit: number): CardState[];
  queryWeak(learnerId: ID, minLapses: number, limit: number): CardState[];
  listByLearner(learnerId: ID): CardState[];
  /** 学习进度重置，返回删除的卡片数 */
  deleteByLearner(learnerId: ID): number;
}

/**
 * 复习日志仓库（只追加）
 */
export interface ReviewHistoryRepository {
  append(record: ReviewRecord): void;
  listByCard(cardId: ID): ReviewRecord[];
  listBySession(sessionId: ID): ReviewRecord[];
  listRecentByLearner(learnerId: ID, since: Date): ReviewRecord[];
}

/**
 * 学习项目录
 */
export interface StudyItemRepository {
  getById(id: ID): StudyItem | null;
  upsert(item: StudyItem): void;
}

/**
 * 会话记录仓库
 */
export interface SessionRecordRepository {
  create(record: SessionRecord): void;
  getById(id: ID): SessionRecord | null;
  update(record: SessionRecord): void;
}

/**
 * 存储中的原始参数行，尚未校验
 */
export interface StoredParameters {
  weights: unknown;
  targetRetention: number;
  maximumIntervalDays: number;
}

export interface StoredLearnerParameters extends StoredParameters {
  learnerId: ID;
}

/**
 * 算法参数仓库
 */
export interface ParameterRepository {
  get(learnerId: ID): StoredParameters | null;
  /** 全部已保存的参数，用于启动时校验 */
  listAll(): StoredLearnerParameters[];
  save(learnerId: ID, parameters: MemoryParameters): void;
}

/**
 * 存储聚合根：提供各仓库与事务边界
 */
export interface SchedulingStore {
  readonly cards: CardRepository;
  readonly history: ReviewHistoryRepository;
  readonly items: StudyItemRepository;
  readonly sessions: SessionRecordRepository;
  readonly parameters: ParameterRepository;
  /**
   * 在单个事务中执行 work，抛出异常时整体回滚
   */
  transaction<T>(work: () => T): T;
}

/**
 * 只读视图，供遗忘项分析、交错练习等下游消费者使用
 */
export interface ReadOnlySchedulingView {
  queryDue(learnerId: ID, now: Date, limit: number, filters?: DueQueryFilters): readonly CardState[];
  listHistoryByCard(cardId: ID): readonly ReviewRecord[];
  listRecentHistory(learnerId: ID, since: Date): readonly ReviewRecord[];
}
