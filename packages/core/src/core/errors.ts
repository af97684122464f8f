/**
 * 调度核心错误体系
 *
 * - ValidationError: 请求参数不合法，发生在任何写入之前
 * - NotFoundError: 卡片 / 会话 / 学习项不存在
 * - PersistenceError: 存储失败，事务已整体回滚
 * - NotificationError: 事件发布失败，只记录日志
 * - ConfigurationError: 参数配置损坏，加载时即失败
 */

import { ZodError } from 'zod';

export type SchedulingErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'PERSISTENCE_ERROR'
  | 'NOTIFICATION_ERROR'
  | 'CONFIGURATION_ERROR';

/**
 * 结构化调度错误基类
 */
export class SchedulingError extends Error {
  code: SchedulingErrorCode;
  isOperational: boolean;

  constructor(message: string, code: SchedulingErrorCode, isOperational: boolean = true) {
    super(message);
    this.name = 'SchedulingError';
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends SchedulingError {
  field?: string;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }

  /**
   * 由 ZodError 构造，保留第一个出错字段
   */
  static fromZod(error: ZodError): ValidationError {
    const first = error.errors[0];
    const field = first ? first.path.join('.') : undefined;
    const message = error.errors
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new ValidationError(message, field || undefined);
  }
}

export class NotFoundError extends SchedulingError {
  resource: string;
  resourceId: string;

  constructor(resource: string, resourceId: string) {
    super(`${resource} 不存在: ${resourceId}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.resource = resource;
    this.resourceId = resourceId;
  }
}

export class PersistenceError extends SchedulingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NotificationError extends SchedulingError {
  eventType: string;

  constructor(eventType: string, options?: { cause?: unknown }) {
    super(`事件发布失败: ${eventType}`, 'NOTIFICATION_ERROR');
    this.name = 'NotificationError';
    this.eventType = eventType;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ConfigurationError extends SchedulingError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', false);
    this.name = 'ConfigurationError';
  }
}

/**
 * 将任意异常归一为 SchedulingError
 * 非领域错误一律视为存储失败
 */
export function toSchedulingError(error: unknown, context: string): SchedulingError {
  if (error instanceof SchedulingError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(`${context}: ${message}`, { cause: error });
}
