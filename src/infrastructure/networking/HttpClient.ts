import nodeFetch, { type RequestInit, type Response } from 'node-fetch';
import { ProxyAgent } from 'proxy-agent';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'HttpClient';

/**
 * 出站 HTTP 调用签名；测试中注入内存实现
 */
export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export class HttpTimeoutError extends Error {
    public readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Request timed out after ${timeoutMs / 1000}s`);
        this.name = 'HttpTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * 创建出站 fetch
 * 如果配置了代理，所有请求走代理感知的 agent
 */
export function createHttpFetch(proxyUrl: string | null): HttpFetch {
    if (!proxyUrl) {
        return (url, init) => nodeFetch(url, init);
    }

    const agent = new ProxyAgent({ getProxyForUrl: () => proxyUrl });
    logger.info({ kind: 'infra', component: COMPONENT, message: `Using outbound proxy: ${proxyUrl}` });
    return (url, init) => nodeFetch(url, { ...init, agent });
}

/** 已完整读取的响应 */
export interface HttpReply {
    status: number;
    ok: boolean;
    text: string;
}

/**
 * 带固定超时的请求：计时覆盖到响应体读完为止
 * 超时会中断请求 (包括正在读取的 body) 并抛 HttpTimeoutError
 */
export async function fetchWithTimeout(
    fetchImpl: HttpFetch,
    url: string,
    init: RequestInit,
    timeoutMs: number
): Promise<HttpReply> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetchImpl(url, { ...init, signal: controller.signal });
        const text = await response.text();
        return { status: response.status, ok: response.ok, text };
    } catch (error) {
        if (controller.signal.aborted || (error instanceof Error && error.name === 'AbortError')) {
            throw new HttpTimeoutError(timeoutMs);
        }
        throw error;
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * 解析 JSON 文本；非法 JSON 返回 undefined
 */
export function parseJsonText(text: string): unknown {
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch {
        return undefined;
    }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);
