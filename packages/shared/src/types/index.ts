/**
 * Shared Types - 类型定义导出
 *
 * 这个包导出调度核心与展示层共享的类型定义
 */

// 通用类型
export * from './common';

// 记忆卡片相关
export * from './card';

// 学习会话相关
export * from './session';
