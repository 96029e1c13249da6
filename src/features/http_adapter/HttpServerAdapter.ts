import http from 'http';
import type { ApiRouter, ApiResponse } from './ApiRouter.js';
import { logger } from '../../platform/logger.js';
import { PayloadTooLargeError } from '../../platform/errors.js';
import { generateTraceId, runWithTraceId, setUserId } from '../../platform/tracing.js';

const COMPONENT = 'HttpServer';
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface HttpServerOptions {
    maxBodyBytes?: number;
}

export type JsonBodyResult = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * 解析请求体：空串视为无 body
 */
export function parseJsonBody(raw: string): JsonBodyResult {
    if (raw.trim() === '') return { ok: true, value: undefined };
    try {
        const value: unknown = JSON.parse(raw);
        return { ok: true, value };
    } catch {
        return { ok: false, error: 'Invalid JSON body' };
    }
}

/**
 * 读取请求体；超过上限立即停止收集并抛 PayloadTooLargeError
 */
function readBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;

        const onData = (chunk: Buffer) => {
            size += chunk.length;
            if (size > maxBytes) {
                req.off('data', onData);
                req.off('end', onEnd);
                reject(new PayloadTooLargeError());
                return;
            }
            chunks.push(chunk);
        };
        const onEnd = () => resolve(Buffer.concat(chunks).toString('utf-8'));

        req.on('data', onData);
        req.on('end', onEnd);
        req.on('error', reject);
    });
}

function headerValue(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * HTTP Adapter (Layer 1 Interface)
 * 职责：
 * 1. 监听 HTTP 请求
 * 2. 解析 JSON body 与 X-User-Id
 * 3. 用 runWithTraceId 包裹，实现全链路追踪
 * 4. 交给 ApiRouter 并写回 JSON
 */
export class HttpServerAdapter {
    private server: http.Server | null = null;

    private readonly maxBodyBytes: number;

    constructor(private readonly router: ApiRouter, options: HttpServerOptions = {}) {
        this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    }

    async start(port: number, host: string): Promise<void> {
        if (this.server) {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Already listening' });
            return;
        }

        const server = http.createServer((req, res) => {
            this.handleRequest(req, res).catch((error) => {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Unhandled request error', error });
                if (!res.headersSent) {
                    this.writeJson(res, { status: 500, body: { error: 'Internal server error' } });
                } else {
                    res.end();
                }
            });
        });

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(port, host, () => {
                server.off('error', reject);
                resolve();
            });
        });

        this.server = server;
        logger.info({ kind: 'sys', component: COMPONENT, message: `Listening on http://${host}:${port}` });
    }

    /** 实际监听端口 (port=0 时由系统分配) */
    listeningPort(): number | null {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : null;
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        this.server = null;
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Server stopped' });
    }

    private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const traceId = generateTraceId();

        await runWithTraceId(traceId, async () => {
            const userId = headerValue(req.headers['x-user-id']);
            if (userId) {
                setUserId(userId);
            }

            const method = req.method ?? 'GET';
            const path = new URL(req.url ?? '/', 'http://localhost').pathname;
            const startedAt = Date.now();
            res.setHeader('X-Trace-Id', traceId);

            const response = await this.dispatch(req, method, path, userId);
            if (response.status === 413) {
                // 剩余 body 不再读取，回复后关闭连接
                res.setHeader('Connection', 'close');
            }

            this.writeJson(res, response);
            logger.info({
                kind: 'sys',
                component: COMPONENT,
                message: `${method} ${path} ${response.status}`,
                meta: { latencyMs: Date.now() - startedAt },
            });
        });
    }

    private async dispatch(
        req: http.IncomingMessage,
        method: string,
        path: string,
        userId: string | undefined
    ): Promise<ApiResponse> {
        let rawBody = '';
        if (method === 'POST') {
            try {
                rawBody = await readBody(req, this.maxBodyBytes);
            } catch (error) {
                if (error instanceof PayloadTooLargeError) {
                    return { status: error.statusCode, body: { error: error.message } };
                }
                throw error;
            }
        }

        const parsed = parseJsonBody(rawBody);
        if (!parsed.ok) {
            return { status: 400, body: { error: parsed.error } };
        }
        return this.router.handle({ method, path, userId, body: parsed.value });
    }

    private writeJson(res: http.ServerResponse, response: ApiResponse): void {
        res.writeHead(response.status, { 'Content-Type': 'application/json; charset=utf-8' });
        res.end(JSON.stringify(response.body));
    }
}
