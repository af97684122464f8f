/**
 * SQLite 连接配置
 *
 * 使用 better-sqlite3 作为本地优先的存储引擎
 * 连接后立即设置 PRAGMA 并初始化表结构
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { dbLogger } from '../logger';
import { SCHEMA_SQL } from '../repositories/schema';

/**
 * SQLite 配置
 */
export interface SQLiteConfig {
  path: string;
  journalMode?: 'WAL' | 'DELETE' | 'MEMORY';
  busyTimeout?: number;
  foreignKeys?: boolean;
}

/**
 * 打开数据库连接并初始化表结构
 */
export function openDatabase(config: SQLiteConfig): DatabaseType {
  const isMemory = config.path === ':memory:';

  if (!isMemory) {
    fs.mkdirSync(path.dirname(config.path), { recursive: true });
  }

  const db = new Database(config.path);

  // 内存数据库不支持 WAL
  if (config.journalMode && !isMemory) {
    db.pragma(`journal_mode = ${config.journalMode}`);
  }
  if (config.busyTimeout) {
    db.pragma(`busy_timeout = ${config.busyTimeout}`);
  }
  if (config.foreignKeys ?? true) {
    db.pragma('foreign_keys = ON');
  }

  db.exec(SCHEMA_SQL);

  dbLogger.info({ path: config.path }, '[Database] SQLite 已连接');

  return db;
}
