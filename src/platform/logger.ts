/**
 * Logger Module - 结构化日志系统
 *
 * 设计原则：
 * 1. 结构化日志 (JSON 格式落盘，开发环境 Pretty 输出)
 * 2. 自动注入 Trace ID 和 User ID
 * 3. 日志分级 (debug/info/warn/error)
 * 4. 日志轮转 (按天切割，保留 14 天)
 * 5. 错误信息完整暴露 (不包裹原始错误)
 *
 * 分类标签 (kind):
 * - biz: 业务日志 (Usecase 层) - 用于还原用户行为
 * - sys: 系统日志 (HTTP Adapter / 启动流程)
 * - infra: 基础设施日志 (存储、上游 HTTP 调用)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getTraceId, getUserId } from './tracing.js';
import config from './config.js';

// ============ 类型定义 ============

/** 日志分类 */
export type LogKind = 'biz' | 'sys' | 'infra';

/** 日志元数据 */
export interface LogMeta {
    /** 日志分类 */
    kind: LogKind;
    /** 组件名称 */
    component: string;
    message: string;
    /** 原始错误对象 (可选) */
    error?: unknown;
    meta?: Record<string, unknown>;
}

const IS_DEV = process.env.NODE_ENV !== 'production';

// ============ 格式化函数 ============

/**
 * 序列化错误对象
 * 关键：保留完整的错误信息，不包裹原始错误
 */
export function serializeError(error: unknown): Record<string, unknown> | undefined {
    if (error === undefined || error === null) return undefined;

    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            // 保留 cause 链 (ES2022 Error Cause)
            ...(error.cause ? { cause: serializeError(error.cause) } : {}),
            // 保留任何自定义属性 (如 AppError.code)
            ...Object.fromEntries(
                Object.entries(error).filter(([key]) => !['name', 'message', 'stack', 'cause'].includes(key))
            ),
        };
    }

    return { raw: typeof error === 'string' ? error : String(error) };
}

/**
 * JSON 格式化器 (生产环境 / 文件)
 */
const jsonFormat = winston.format.printf(({ level, message, timestamp, ...rest }) => {
    const logObject: Record<string, unknown> = {
        timestamp,
        level,
        traceId: getTraceId() || '-',
        userId: getUserId() || '-',
        ...rest,
        message,
    };

    if (rest.error) {
        logObject.error = serializeError(rest.error);
    }

    return JSON.stringify(logObject);
});

/**
 * Pretty 格式化器 (开发环境)
 */
const prettyFormat = winston.format.printf(({ level, message, timestamp, kind, component, error, meta }) => {
    const traceId = getTraceId() || '-';
    const userId = getUserId() || '-';

    let output = `${timestamp} [${level.toUpperCase().padEnd(5)}] [${kind || 'sys'}] [${traceId}] [${userId}] ${component || 'App'}: ${message}`;

    const serialized = serializeError(error);
    if (serialized) {
        output += `\n  error: ${serialized.name} - ${serialized.message}`;
        if (serialized.stack) {
            output += `\n  stack: ${serialized.stack}`;
        }
        if (serialized.cause) {
            output += `\n  cause: ${JSON.stringify(serialized.cause)}`;
        }
    }

    if (meta && typeof meta === 'object' && Object.keys(meta).length > 0) {
        output += `\n  meta: ${JSON.stringify(meta)}`;
    }

    return output;
});

// ============ Transport 配置 ============

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize({ all: IS_DEV }),
            IS_DEV ? prettyFormat : jsonFormat
        ),
    }),
];

/**
 * 文件 Transport (日志轮转)
 * - 按天切割
 * - 保留 14 天
 * - 单文件最大 50MB
 */
if (config.logging.toFile) {
    transports.push(
        new DailyRotateFile({
            dirname: config.logging.dir,
            filename: 'app-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '50m',
            maxFiles: '14d',
            format: winston.format.combine(
                winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
                jsonFormat
            ),
        })
    );
}

const winstonLogger = winston.createLogger({
    level: config.logging.level,
    transports,
});

// ============ 封装的 Logger API ============

/**
 * 统一的日志接口
 *
 * @example
 * logger.error({
 *     kind: 'infra',
 *     component: 'McpToolBridge',
 *     message: 'Tool call failed',
 *     error, // 传入原始错误对象
 *     meta: { toolName, status }
 * });
 */
export const logger = {
    debug: ({ message, ...rest }: LogMeta) => winstonLogger.debug(message, rest),
    info: ({ message, ...rest }: LogMeta) => winstonLogger.info(message, rest),
    warn: ({ message, ...rest }: LogMeta) => winstonLogger.warn(message, rest),
    error: ({ message, ...rest }: LogMeta) => winstonLogger.error(message, rest),
};

// ============ 便捷函数 ============

/**
 * 快速创建业务日志 (Usecase 层)
 */
export function bizLog(component: string, message: string, meta?: Record<string, unknown>) {
    logger.info({ kind: 'biz', component, message, meta });
}
