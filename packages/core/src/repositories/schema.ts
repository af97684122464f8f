/**
 * SQLite 表结构
 *
 * 时间字段统一存储为毫秒时间戳 (INTEGER)
 * review_history 只追加，不对 cards 建外键，学习进度重置后日志仍保留
 */

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS "study_items" (
    "id" TEXT PRIMARY KEY,
    "answer" TEXT NOT NULL,
    "category" TEXT
  );

  CREATE TABLE IF NOT EXISTS "cards" (
    "id" TEXT PRIMARY KEY,
    "learner_id" TEXT NOT NULL,
    "item_id" TEXT NOT NULL REFERENCES "study_items" ("id"),
    "difficulty" REAL NOT NULL DEFAULT 5.0,
    "stability" REAL NOT NULL DEFAULT 1.0,
    "retrievability" REAL NOT NULL DEFAULT 1.0,
    "phase" TEXT NOT NULL DEFAULT 'NEW' CHECK ("phase" IN ('NEW', 'LEARNING', 'REVIEW')),
    "review_count" INTEGER NOT NULL DEFAULT 0,
    "lapse_count" INTEGER NOT NULL DEFAULT 0,
    "success_count" INTEGER NOT NULL DEFAULT 0,
    "last_review_at" INTEGER,
    "next_review_at" INTEGER NOT NULL,
    "created_at" INTEGER NOT NULL,
    "updated_at" INTEGER NOT NULL,
    UNIQUE ("learner_id", "item_id")
  );

  CREATE INDEX IF NOT EXISTS "idx_cards_next_review" ON "cards" ("learner_id", "next_review_at");
  CREATE INDEX IF NOT EXISTS "idx_cards_lapses" ON "cards" ("learner_id", "lapse_count");

  CREATE TABLE IF NOT EXISTS "review_history" (
    "id" TEXT PRIMARY KEY,
    "card_id" TEXT NOT NULL,
    "item_id" TEXT NOT NULL,
    "rating" INTEGER NOT NULL CHECK ("rating" BETWEEN 1 AND 4),
    "response_time_ms" INTEGER NOT NULL,
    "difficulty_before" REAL NOT NULL,
    "stability_before" REAL NOT NULL,
    "retrievability_before" REAL NOT NULL,
    "difficulty_after" REAL NOT NULL,
    "stability_after" REAL NOT NULL,
    "retrievability_after" REAL NOT NULL,
    "interval_days" REAL NOT NULL,
    "session_id" TEXT,
    "review_type" TEXT NOT NULL,
    "reviewed_at" INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS "idx_review_history_card" ON "review_history" ("card_id", "reviewed_at");
  CREATE INDEX IF NOT EXISTS "idx_review_history_session" ON "review_history" ("session_id");
  CREATE INDEX IF NOT EXISTS "idx_review_history_date" ON "review_history" ("reviewed_at");

  CREATE TABLE IF NOT EXISTS "learning_sessions" (
    "id" TEXT PRIMARY KEY,
    "learner_id" TEXT NOT NULL,
    "session_type" TEXT NOT NULL,
    "status" TEXT NOT NULL,
    "started_at" INTEGER NOT NULL,
    "ended_at" INTEGER,
    "duration_seconds" INTEGER,
    "questions_reviewed" INTEGER NOT NULL DEFAULT 0,
    "questions_correct" INTEGER NOT NULL DEFAULT 0,
    "average_response_time_ms" INTEGER,
    "retention_rate" REAL,
    "target_retention" REAL NOT NULL,
    "max_items" INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS "algorithm_config" (
    "learner_id" TEXT PRIMARY KEY,
    "parameters" TEXT NOT NULL,
    "target_retention" REAL NOT NULL,
    "maximum_interval_days" INTEGER NOT NULL,
    "updated_at" INTEGER NOT NULL
  );
`;
