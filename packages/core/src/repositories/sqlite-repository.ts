/**
 * SQLite 仓库实现
 *
 * 使用 better-sqlite3 预编译语句实现各仓库接口
 * 事务通过 db.transaction 包裹，抛出异常即整体回滚
 */

import type { Database as DatabaseType } from 'better-sqlite3';
import type {
  CardPhase,
  CardState,
  ID,
  MemoryParameters,
  Rating,
  ReviewRecord,
  ReviewType,
  SessionRecord,
  SessionStatus,
  SessionType,
  StudyItem,
} from '@spaced/shared';
import type {
  CardRepository,
  DueQueryFilters,
  ParameterRepository,
  ReviewHistoryRepository,
  SchedulingStore,
  SessionRecordRepository,
  StoredLearnerParameters,
  StoredParameters,
  StudyItemRepository,
} from './types';

// ==================== 行类型 ====================

interface CardRow {
  id: string;
  learner_id: string;
  item_id: string;
  difficulty: number;
  stability: number;
  retrievability: number;
  phase: CardPhase;
  review_count: number;
  lapse_count: number;
  success_count: number;
  last_review_at: number | null;
  next_review_at: number;
  created_at: number;
  updated_at: number;
}

interface ReviewRow {
  id: string;
  card_id: string;
  item_id: string;
  rating: Rating;
  response_time_ms: number;
  difficulty_before: number;
  stability_before: number;
  retrievability_before: number;
  difficulty_after: number;
  stability_after: number;
  retrievability_after: number;
  interval_days: number;
  session_id: string | null;
  review_type: ReviewType;
  reviewed_at: number;
}

interface SessionRow {
  id: string;
  learner_id: string;
  session_type: SessionType;
  status: SessionStatus;
  started_at: number;
  ended_at: number | null;
  duration_seconds: number | null;
  questions_reviewed: number;
  questions_correct: number;
  average_response_time_ms: number | null;
  retention_rate: number | null;
  target_retention: number;
  max_items: number;
}

interface ParameterRow {
  learner_id: string;
  parameters: string;
  target_retention: number;
  maximum_interval_days: number;
  updated_at: number;
}

// ==================== 行映射 ====================

function toDate(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

function toCardState(row: CardRow): CardState {
  return {
    id: row.id,
    learnerId: row.learner_id,
    itemId: row.item_id,
    difficulty: row.difficulty,
    stability: row.stability,
    retrievability: row.retrievability,
    phase: row.phase,
    reviewCount: row.review_count,
    lapseCount: row.lapse_count,
    successCount: row.success_count,
    lastReviewAt: toDate(row.last_review_at),
    nextReviewAt: new Date(row.next_review_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toCardRow(card: CardState): CardRow {
  return {
    id: card.id,
    learner_id: card.learnerId,
    item_id: card.itemId,
    difficulty: card.difficulty,
    stability: card.stability,
    retrievability: card.retrievability,
    phase: card.phase,
    review_count: card.reviewCount,
    lapse_count: card.lapseCount,
    success_count: card.successCount,
    last_review_at: card.lastReviewAt ? card.lastReviewAt.getTime() : null,
    next_review_at: card.nextReviewAt.getTime(),
    created_at: card.createdAt.getTime(),
    updated_at: card.updatedAt.getTime(),
  };
}

function toReviewRecord(row: ReviewRow): ReviewRecord {
  return {
    id: row.id,
    cardId: row.card_id,
    itemId: row.item_id,
    rating: row.rating,
    responseTimeMs: row.response_time_ms,
    difficultyBefore: row.difficulty_before,
    stabilityBefore: row.stability_before,
    retrievabilityBefore: row.retrievability_before,
    difficultyAfter: row.difficulty_after,
    stabilityAfter: row.stability_after,
    retrievabilityAfter: row.retrievability_after,
    intervalDays: row.interval_days,
    sessionId: row.session_id,
    reviewType: row.review_type,
    reviewedAt: new Date(row.reviewed_at),
  };
}

function toReviewRow(record: ReviewRecord): ReviewRow {
  return {
    id: record.id,
    card_id: record.cardId,
    item_id: record.itemId,
    rating: record.rating,
    response_time_ms: Math.round(record.responseTimeMs),
    difficulty_before: record.difficultyBefore,
    stability_before: record.stabilityBefore,
    retrievability_before: record.retrievabilityBefore,
    difficulty_after: record.difficultyAfter,
    stability_after: record.stabilityAfter,
    retrievability_after: record.retrievabilityAfter,
    interval_days: record.intervalDays,
    session_id: record.sessionId,
    review_type: record.reviewType,
    reviewed_at: record.reviewedAt.getTime(),
  };
}

function toSessionRecord(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    learnerId: row.learner_id,
    sessionType: row.session_type,
    status: row.status,
    startedAt: new Date(row.started_at),
    endedAt: toDate(row.ended_at),
    durationSeconds: row.duration_seconds,
    questionsReviewed: row.questions_reviewed,
    questionsCorrect: row.questions_correct,
    averageResponseTimeMs: row.average_response_time_ms,
    retentionRate: row.retention_rate,
    targetRetention: row.target_retention,
    maxItems: row.max_items,
  };
}

function toSessionRow(record: SessionRecord): SessionRow {
  return {
    id: record.id,
    learner_id: record.learnerId,
    session_type: record.sessionType,
    status: record.status,
    started_at: record.startedAt.getTime(),
    ended_at: record.endedAt ? record.endedAt.getTime() : null,
    duration_seconds: record.durationSeconds,
    questions_reviewed: record.questionsReviewed,
    questions_correct: record.questionsCorrect,
    average_response_time_ms: record.averageResponseTimeMs,
    retention_rate: record.retentionRate,
    target_retention: record.targetRetention,
    max_items: record.maxItems,
  };
}

function toStoredParameters(row: ParameterRow): StoredLearnerParameters {
  let weights: unknown;
  try {
    weights = JSON.parse(row.parameters);
  } catch {
    // 保留原始文本，由参数存储在加载时判定为配置错误
    weights = row.parameters;
  }

  return {
    learnerId: row.learner_id,
    weights,
    targetRetention: row.target_retention,
    maximumIntervalDays: row.maximum_interval_days,
  };
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

// ==================== 卡片仓库 ====================

const CARD_COLUMNS = `
  "id", "learner_id", "item_id", "difficulty", "stability", "retrievability", "phase",
  "review_count", "lapse_count", "success_count", "last_review_at", "next_review_at",
  "created_at", "updated_at"
`;

const CARD_VALUES = `
  @id, @learner_id, @item_id, @difficulty, @stability, @retrievability, @phase,
  @review_count, @lapse_count, @success_count, @last_review_at, @next_review_at,
  @created_at, @updated_at
`;

export class SqliteCardRepository implements CardRepository {
  constructor(private readonly db: DatabaseType) {}

  getById(id: ID): CardState | null {
    const row = this.db.prepare<[string], CardRow>('SELECT * FROM "cards" WHERE "id" = ?').get(id);
    return row ? toCardState(row) : null;
  }

  getByLearnerAndItem(learnerId: ID, itemId: ID): CardState | null {
    const row = this.db
      .prepare<[string, string], CardRow>(
        'SELECT * FROM "cards" WHERE "learner_id" = ? AND "item_id" = ?',
      )
      .get(learnerId, itemId);
    return row ? toCardState(row) : null;
  }

  insert(card: CardState): void {
    this.db
      .prepare<CardRow>(`INSERT INTO "cards" (${CARD_COLUMNS}) VALUES (${CARD_VALUES})`)
      .run(toCardRow(card));
  }

  upsert(card: CardState): void {
    this.db
      .prepare<CardRow>(
        `INSERT INTO "cards" (${CARD_COLUMNS}) VALUES (${CARD_VALUES})
         ON CONFLICT ("id") DO UPDATE SET
           "difficulty" = excluded."difficulty",
           "stability" = excluded."stability",
           "retrievability" = excluded."retrievability",
           "phase" = excluded."phase",
           "review_count" = excluded."review_count",
           "lapse_count" = excluded."lapse_count",
           "success_count" = excluded."success_count",
           "last_review_at" = excluded."last_review_at",
           "next_review_at" = excluded."next_review_at",
           "updated_at" = excluded."updated_at"`,
      )
      .run(toCardRow(card));
  }

  queryDue(learnerId: ID, now: Date, limit: number, filters: DueQueryFilters = {}): CardState[] {
    const conditions = ['c."learner_id" = ?', '(c."next_review_at" <= ? OR c."review_count" = 0)'];
    const params: Array<string | number> = [learnerId, now.getTime()];

    if (filters.categories && filters.categories.length > 0) {
      conditions.push(`i."category" IN (${placeholders(filters.categories.length)})`);
      params.push(...filters.categories);
    }
    if (filters.excludeCardIds && filters.excludeCardIds.length > 0) {
      conditions.push(`c."id" NOT IN (${placeholders(filters.excludeCardIds.length)})`);
      params.push(...filters.excludeCardIds);
    }

    const sql = `
      SELECT c.* FROM "cards" c
      JOIN "study_items" i ON i."id" = c."item_id"
      WHERE ${conditions.join(' AND ')}
      ORDER BY c."next_review_at" ASC, c."rowid" ASC
      LIMIT ?
    `;
    return this.db
      .prepare<Array<string | number>, CardRow>(sql)
      .all(...params, limit)
      .map(toCardState);
  }

  queryNew(learnerId: ID, limit: number): CardState[] {
    return this.db
      .prepare<[string, number], CardRow>(
        `SELECT * FROM "cards" WHERE "learner_id" = ? AND "review_count" = 0
         ORDER BY "created_at" ASC, "rowid" ASC LIMIT ?`,
      )
      .all(learnerId, limit)
      .map(toCardState);
  }

  queryWeak(learnerId: ID, minLapses: number, limit: number): CardState[] {
    return this.db
      .prepare<[string, number, number], CardRow>(
        `SELECT * FROM "cards" WHERE "learner_id" = ? AND "lapse_count" >= ?
         ORDER BY "lapse_count" DESC, "next_review_at" ASC, "rowid" ASC LIMIT ?`,
      )
      .all(learnerId, minLapses, limit)
      .map(toCardState);
  }

  listByLearner(learnerId: ID): CardState[] {
    return this.db
      .prepare<[string], CardRow>(
        'SELECT * FROM "cards" WHERE "learner_id" = ? ORDER BY "rowid" ASC',
      )
      .all(learnerId)
      .map(toCardState);
  }

  deleteByLearner(learnerId: ID): number {
    return this.db.prepare<[string]>('DELETE FROM "cards" WHERE "learner_id" = ?').run(learnerId)
      .changes;
  }
}

// ==================== 复习日志仓库 ====================

export class SqliteReviewHistoryRepository implements ReviewHistoryRepository {
  constructor(private readonly db: DatabaseType) {}

  append(record: ReviewRecord): void {
    this.db
      .prepare<ReviewRow>(
        `INSERT INTO "review_history" (
          "id", "card_id", "item_id", "rating", "response_time_ms",
          "difficulty_before", "stability_before", "retrievability_before",
          "difficulty_after", "stability_after", "retrievability_after",
          "interval_days", "session_id", "review_type", "reviewed_at"
        ) VALUES (
          @id, @card_id, @item_id, @rating, @response_time_ms,
          @difficulty_before, @stability_before, @retrievability_before,
          @difficulty_after, @stability_after, @retrievability_after,
          @interval_days, @session_id, @review_type, @reviewed_at
        )`,
      )
      .run(toReviewRow(record));
  }

  listByCard(cardId: ID): ReviewRecord[] {
    return this.db
      .prepare<[string], ReviewRow>(
        'SELECT * FROM "review_history" WHERE "card_id" = ? ORDER BY "reviewed_at" ASC, "rowid" ASC',
      )
      .all(cardId)
      .map(toReviewRecord);
  }

  listBySession(sessionId: ID): ReviewRecord[] {
    return this.db
      .prepare<[string], ReviewRow>(
        'SELECT * FROM "review_history" WHERE "session_id" = ? ORDER BY "reviewed_at" ASC, "rowid" ASC',
      )
      .all(sessionId)
      .map(toReviewRecord);
  }

  listRecentByLearner(learnerId: ID, since: Date): ReviewRecord[] {
    return this.db
      .prepare<[string, number], ReviewRow>(
        `SELECT h.* FROM "review_history" h
         JOIN "cards" c ON c."id" = h."card_id"
         WHERE c."learner_id" = ? AND h."reviewed_at" >= ?
         ORDER BY h."reviewed_at" ASC, h."rowid" ASC`,
      )
      .all(learnerId, since.getTime())
      .map(toReviewRecord);
  }
}

// ==================== 学习项目录 ====================

export class SqliteStudyItemRepository implements StudyItemRepository {
  constructor(private readonly db: DatabaseType) {}

  getById(id: ID): StudyItem | null {
    const row = this.db
      .prepare<[string], StudyItem>('SELECT "id", "answer", "category" FROM "study_items" WHERE "id" = ?')
      .get(id);
    return row ?? null;
  }

  upsert(item: StudyItem): void {
    this.db
      .prepare<StudyItem>(
        `INSERT INTO "study_items" ("id", "answer", "category") VALUES (@id, @answer, @category)
         ON CONFLICT ("id") DO UPDATE SET "answer" = excluded."answer", "category" = excluded."category"`,
      )
      .run(item);
  }
}

// ==================== 会话记录仓库 ====================

export class SqliteSessionRecordRepository implements SessionRecordRepository {
  constructor(private readonly db: DatabaseType) {}

  create(record: SessionRecord): void {
    this.db
      .prepare<SessionRow>(
        `INSERT INTO "learning_sessions" (
          "id", "learner_id", "session_type", "status", "started_at", "ended_at",
          "duration_seconds", "questions_reviewed", "questions_correct",
          "average_response_time_ms", "retention_rate", "target_retention", "max_items"
        ) VALUES (
          @id, @learner_id, @session_type, @status, @started_at, @ended_at,
          @duration_seconds, @questions_reviewed, @questions_correct,
          @average_response_time_ms, @retention_rate, @target_retention, @max_items
        )`,
      )
      .run(toSessionRow(record));
  }

  getById(id: ID): SessionRecord | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM "learning_sessions" WHERE "id" = ?')
      .get(id);
    return row ? toSessionRecord(row) : null;
  }

  update(record: SessionRecord): void {
    this.db
      .prepare<SessionRow>(
        `UPDATE "learning_sessions" SET
          "status" = @status,
          "ended_at" = @ended_at,
          "duration_seconds" = @duration_seconds,
          "questions_reviewed" = @questions_reviewed,
          "questions_correct" = @questions_correct,
          "average_response_time_ms" = @average_response_time_ms,
          "retention_rate" = @retention_rate
        WHERE "id" = @id`,
      )
      .run(toSessionRow(record));
  }
}

// ==================== 算法参数仓库 ====================

export class SqliteParameterRepository implements ParameterRepository {
  constructor(private readonly db: DatabaseType) {}

  get(learnerId: ID): StoredParameters | null {
    const row = this.db
      .prepare<[string], ParameterRow>('SELECT * FROM "algorithm_config" WHERE "learner_id" = ?')
      .get(learnerId);
    return row ? toStoredParameters(row) : null;
  }

  listAll(): StoredLearnerParameters[] {
    return this.db
      .prepare<[], ParameterRow>('SELECT * FROM "algorithm_config" ORDER BY "learner_id"')
      .all()
      .map(toStoredParameters);
  }

  save(learnerId: ID, parameters: MemoryParameters): void {
    this.db
      .prepare<ParameterRow>(
        `INSERT INTO "algorithm_config" ("learner_id", "parameters", "target_retention", "maximum_interval_days", "updated_at")
         VALUES (@learner_id, @parameters, @target_retention, @maximum_interval_days, @updated_at)
         ON CONFLICT ("learner_id") DO UPDATE SET
           "parameters" = excluded."parameters",
           "target_retention" = excluded."target_retention",
           "maximum_interval_days" = excluded."maximum_interval_days",
           "updated_at" = excluded."updated_at"`,
      )
      .run({
        learner_id: learnerId,
        parameters: JSON.stringify(parameters.weights),
        target_retention: parameters.targetRetention,
        maximum_interval_days: parameters.maximumIntervalDays,
        updated_at: Date.now(),
      });
  }
}

// ==================== 存储聚合 ====================

export class SqliteSchedulingStore implements SchedulingStore {
  readonly cards: SqliteCardRepository;
  readonly history: SqliteReviewHistoryRepository;
  readonly items: SqliteStudyItemRepository;
  readonly sessions: SqliteSessionRecordRepository;
  readonly parameters: SqliteParameterRepository;

  constructor(private readonly db: DatabaseType) {
    this.cards = new SqliteCardRepository(db);
    this.history = new SqliteReviewHistoryRepository(db);
    this.items = new SqliteStudyItemRepository(db);
    this.sessions = new SqliteSessionRecordRepository(db);
    this.parameters = new SqliteParameterRepository(db);
  }

  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }
}
