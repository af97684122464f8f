/**
 * @spaced/shared
 *
 * 调度核心与展示层共享的类型与 Schema
 */

export * from './types';
export * from './schemas';
