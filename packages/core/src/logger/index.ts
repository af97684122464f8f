/**
 * 统一日志系统 - 基线配置
 *
 * 功能:
 * - 结构化 JSON 日志输出（生产环境）
 * - 美化控制台输出（开发环境）
 * - 敏感字段自动脱敏
 * - 支持子日志器创建
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ==================== 配置常量 ====================

/** 默认日志级别 */
const DEFAULT_LOG_LEVEL = 'info';

/** 应用名称 */
const APP_NAME = 'spaced-core';

/** 需要脱敏的字段路径 */
const REDACT_PATHS = ['*.password', '*.token', '*.secret', '*.apiKey', '*.credentials'];

// ==================== 环境检测 ====================

const LOG_LEVEL = process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_PRODUCTION = NODE_ENV === 'production';
const IS_TEST = NODE_ENV === 'test';

// ==================== 序列化器 ====================

/**
 * 错误序列化器 - 保留完整堆栈和错误代码
 */
function errSerializer(err: Error): pino.SerializedError {
  const serialized = pino.stdSerializers.err(err);

  if ('code' in err && typeof err.code === 'string') {
    serialized.code = err.code;
  }

  return serialized;
}

/** 序列化器集合 */
export const serializers = {
  err: errSerializer,
  error: errSerializer,
};

// ==================== 日志器配置 ====================

function buildLoggerOptions(): LoggerOptions {
  return {
    level: LOG_LEVEL,

    base: {
      app: APP_NAME,
      env: NODE_ENV,
    },

    serializers,

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    formatters: {
      level(label: string) {
        return { level: label };
      },
      bindings(bindings) {
        // 开发环境移除 pid/hostname 以减少噪音
        if (IS_PRODUCTION) {
          return bindings;
        }
        return {
          ...bindings,
          pid: undefined,
          hostname: undefined,
        };
      },
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * 构建日志传输
 */
function buildTransport(): DestinationStream | undefined {
  // 测试环境不使用特殊传输
  if (IS_TEST) {
    return undefined;
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (!IS_PRODUCTION) {
    targets.push({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: false,
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
  } else {
    targets.push({
      target: 'pino/file',
      options: { destination: 1 }, // stdout
    });
  }

  try {
    return pino.transport({ targets });
  } catch (err) {
    console.warn('[Logger] Failed to create transport, falling back to JSON output:', err);
    return undefined;
  }
}

// ==================== 创建日志器实例 ====================

export const logger: Logger = pino(buildLoggerOptions(), buildTransport());

// ==================== 子日志器工厂 ====================

/**
 * 子日志器绑定字段类型
 */
export interface LoggerBindings {
  /** 模块名称 */
  module?: string;
  /** 学习者ID */
  learnerId?: string;
  /** 会话ID */
  sessionId?: string;
  [key: string]: unknown;
}

/**
 * 创建子日志器
 *
 * @example
 * ```typescript
 * const reviewLogger = createChildLogger({ module: 'review' });
 * reviewLogger.info({ cardId }, '[Review] 评分完成');
 * ```
 */
export function createChildLogger(bindings: LoggerBindings = {}): Logger {
  return logger.child(bindings);
}

// ==================== 预置模块日志器 ====================

/** 数据库模块日志器 */
export const dbLogger = createChildLogger({ module: 'database' });

/** 启动流程日志器 */
export const startupLogger = createChildLogger({ module: 'startup' });

/** 服务层日志器 */
export const serviceLogger = createChildLogger({ module: 'service' });

export type { Logger } from 'pino';
