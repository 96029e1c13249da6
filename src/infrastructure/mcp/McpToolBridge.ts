import type { IToolBridge, McpCapabilities, ToolCallResult } from '../../features/chat/ports/IToolBridge.js';
import { logger } from '../../platform/logger.js';
import { toErrorMessage } from '../../platform/errors.js';
import { HttpTimeoutError, fetchWithTimeout, isRecord, parseJsonText, type HttpFetch } from '../networking/HttpClient.js';

const COMPONENT = 'McpToolBridge';

export interface McpToolBridgeOptions {
    baseUrl: string;
    callTimeoutMs: number;
    capabilitiesTimeoutMs: number;
    fetch: HttpFetch;
}

/**
 * Layer D: Adapter - MCP 工具服务 HTTP 桥接
 *
 * 协议：
 * - POST {base}/mcp/message?sessionId={id}  body: { method: "tools/call", params: { name, arguments } }
 * - GET  {base}/mcp/capabilities
 *
 * 不做重试；无论成功失败都返回耗时
 */
export class McpToolBridge implements IToolBridge {
    constructor(private readonly options: McpToolBridgeOptions) {}

    async callTool(sessionId: string, toolName: string, args: Record<string, unknown>): Promise<ToolCallResult> {
        const url = `${this.options.baseUrl}/mcp/message?sessionId=${encodeURIComponent(sessionId)}`;
        const payload = {
            method: 'tools/call',
            params: {
                name: toolName,
                arguments: args,
            },
        };

        const startedAt = Date.now();
        try {
            const reply = await fetchWithTimeout(
                this.options.fetch,
                url,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(payload),
                },
                this.options.callTimeoutMs
            );

            if (reply.status !== 200) {
                const errText = reply.text;
                const durationMs = Date.now() - startedAt;
                logger.error({
                    kind: 'infra',
                    component: COMPONENT,
                    message: `MCP tool call failed: ${toolName}`,
                    meta: { status: reply.status, durationMs, body: errText.slice(0, 200) },
                });
                return { success: false, error: `HTTP ${reply.status}: ${errText}`, durationMs, timedOut: false };
            }

            const body = parseJsonText(reply.text);
            const durationMs = Date.now() - startedAt;
            if (body === undefined) {
                return { success: false, error: 'Invalid JSON in MCP response', durationMs, timedOut: false };
            }

            logger.info({ kind: 'infra', component: COMPONENT, message: `MCP tool call successful: ${toolName}`, meta: { durationMs } });
            return {
                success: true,
                // response 字段约定为对象；非对象结果包一层
                data: isRecord(body) ? body : { result: body },
                durationMs,
            };
        } catch (error) {
            const durationMs = Date.now() - startedAt;
            logger.error({ kind: 'infra', component: COMPONENT, message: `MCP tool call exception: ${toolName}`, error, meta: { durationMs } });
            return {
                success: false,
                error: toErrorMessage(error),
                durationMs,
                timedOut: error instanceof HttpTimeoutError,
            };
        }
    }

    async getCapabilities(): Promise<McpCapabilities> {
        try {
            const reply = await fetchWithTimeout(
                this.options.fetch,
                `${this.options.baseUrl}/mcp/capabilities`,
                { method: 'GET' },
                this.options.capabilitiesTimeoutMs
            );

            if (reply.status !== 200) {
                return { error: `HTTP ${reply.status}` };
            }

            const body = parseJsonText(reply.text);
            if (!isRecord(body)) {
                return { error: 'Invalid capabilities response' };
            }
            return body;
        } catch (error) {
            logger.warn({ kind: 'infra', component: COMPONENT, message: 'Failed to fetch MCP capabilities', error });
            return { error: toErrorMessage(error) };
        }
    }
}
