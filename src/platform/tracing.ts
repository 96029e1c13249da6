/**
 * Tracing Module - AsyncLocalStorage 封装
 *
 * 职责：
 * 1. 管理请求级别的上下文 (Trace ID, User ID)
 * 2. 提供全链路追踪能力，解决并发日志混杂问题
 * 3. 为落库的消息提供 trace_id / span_id 关联字段
 */

import { AsyncLocalStorage } from 'async_hooks';
import { nanoid } from 'nanoid';

/**
 * 追踪上下文结构
 */
export interface TraceContext {
    /** 唯一追踪 ID，用于串联一次请求的所有日志 */
    traceId: string;
    /** 请求方用户 ID (X-User-Id) */
    userId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<TraceContext>();

/**
 * 生成唯一的 Trace ID
 * 使用 nanoid 生成 12 位短 ID，足够区分并发请求
 */
export function generateTraceId(): string {
    return nanoid(12);
}

/**
 * 每条落库记录一个 span，8 位即可
 */
export function generateSpanId(): string {
    return nanoid(8);
}

/**
 * 在追踪上下文中运行异步函数
 *
 * @example
 * await runWithTraceId(generateTraceId(), async () => {
 *     // 这里的所有代码（包括嵌套的异步调用）都能访问到 traceId
 *     logger.info({ ... }); // 自动带上 traceId
 * });
 */
export async function runWithTraceId<T>(traceId: string, fn: () => Promise<T>): Promise<T> {
    const context: TraceContext = { traceId };
    return asyncLocalStorage.run(context, fn);
}

/**
 * 获取当前的 Trace ID
 * 如果不在追踪上下文中，返回 undefined
 */
export function getTraceId(): string | undefined {
    return asyncLocalStorage.getStore()?.traceId;
}

export function getUserId(): string | undefined {
    return asyncLocalStorage.getStore()?.userId;
}

/**
 * 设置当前上下文的 User ID
 * 必须在 runWithTraceId 内部调用
 */
export function setUserId(userId: string): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
        store.userId = userId;
    }
}
