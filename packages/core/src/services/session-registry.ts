/**
 * 活跃会话注册表
 *
 * 由编排器实例持有，多个编排器之间互不共享状态
 */

import type { ID, SessionConfig, SessionProgress, SessionRecord } from '@spaced/shared';

/**
 * 一个进行中的会话
 */
export interface ActiveSession {
  record: SessionRecord;
  config: SessionConfig;
  /** 开始时选出的候选卡片，按出题顺序 */
  candidateIds: ID[];
  /** 本会话中已作答的卡片 */
  answeredIds: Set<ID>;
  progress: SessionProgress;
}

export class SessionRegistry {
  private sessions = new Map<ID, ActiveSession>();

  register(session: ActiveSession): void {
    this.sessions.set(session.record.id, session);
  }

  get(sessionId: ID): ActiveSession | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: ID): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * 释放会话，返回是否存在
   */
  release(sessionId: ID): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
