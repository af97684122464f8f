/**
 * 测试夹具：内存数据库与卡片构造
 */

import type { Database as DatabaseType } from 'better-sqlite3';
import type { CardState, StudyItem } from '@spaced/shared';
import { openDatabase } from '../../src/config/database';
import { SqliteSchedulingStore } from '../../src/repositories';

export const LEARNER_ID = 'learner-1';
export const OTHER_LEARNER_ID = 'learner-2';

/** 固定的测试起始时间 */
export const T0 = new Date('2024-03-01T08:00:00.000Z');

export const DAY_MS = 86_400_000;

export interface TestContext {
  db: DatabaseType;
  store: SqliteSchedulingStore;
}

export function createTestStore(): TestContext {
  const db = openDatabase({ path: ':memory:' });
  return { db, store: new SqliteSchedulingStore(db) };
}

export function seedItem(store: SqliteSchedulingStore, overrides: Partial<StudyItem> = {}): StudyItem {
  const item: StudyItem = {
    id: 'item-1',
    answer: 'B',
    category: 'networking',
    ...overrides,
  };
  store.items.upsert(item);
  return item;
}

export function buildCard(overrides: Partial<CardState> = {}): CardState {
  return {
    id: 'card-1',
    learnerId: LEARNER_ID,
    itemId: 'item-1',
    difficulty: 5,
    stability: 1,
    retrievability: 1,
    phase: 'NEW',
    reviewCount: 0,
    lapseCount: 0,
    successCount: 0,
    lastReviewAt: null,
    nextReviewAt: T0,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

/**
 * 写入学习项与对应卡片
 */
export function seedCard(store: SqliteSchedulingStore, overrides: Partial<CardState> = {}): CardState {
  const card = buildCard(overrides);
  if (!store.items.getById(card.itemId)) {
    seedItem(store, { id: card.itemId });
  }
  store.cards.insert(card);
  return card;
}
