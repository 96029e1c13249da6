import type { ChatTurn, CompletionResult } from '../../../features/chat/ports/ICompletionProvider.js';
import { logger } from '../../../platform/logger.js';
import { toErrorMessage } from '../../../platform/errors.js';
import { fetchWithTimeout, isRecord, parseJsonText, type HttpFetch } from '../../networking/HttpClient.js';
import type { CompletionBackend, CompletionParams } from './CompletionBackend.js';

const COMPONENT = 'LocalCompletionBackend';

export interface LocalBackendOptions {
    /** 本地模型服务根路径，如 http://localhost:11434 */
    baseUrl: string;
    timeoutMs: number;
    fetch: HttpFetch;
}

/**
 * Layer D: Adapter - 本地模型服务 (Ollama /api/chat)
 * 非流式调用；该接口不返回 token 用量，tokensUsed 固定为 null
 */
export class LocalCompletionBackend implements CompletionBackend {
    readonly provider = 'local' as const;

    constructor(private readonly options: LocalBackendOptions) {}

    isAvailable(): boolean {
        return this.options.baseUrl.length > 0;
    }

    async complete(messages: ChatTurn[], params: CompletionParams): Promise<CompletionResult> {
        const url = `${this.options.baseUrl}/api/chat`;
        const payload = {
            model: params.model,
            messages,
            stream: false,
            options: {
                temperature: params.temperature,
                num_predict: params.maxTokens,
            },
        };

        try {
            const reply = await fetchWithTimeout(
                this.options.fetch,
                url,
                {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(payload),
                },
                this.options.timeoutMs
            );

            if (!reply.ok) {
                const errText = reply.text;
                logger.error({
                    kind: 'infra',
                    component: COMPONENT,
                    message: 'Local model request failed',
                    meta: { status: reply.status, model: params.model },
                });
                return { success: false, error: `HTTP ${reply.status}: ${errText}` };
            }

            const body = parseJsonText(reply.text);
            if (!isRecord(body) || !isRecord(body.message) || typeof body.message.content !== 'string') {
                return { success: false, error: 'Malformed local model response: missing message.content' };
            }

            return {
                success: true,
                content: body.message.content,
                model: params.model,
                tokensUsed: null,
            };
        } catch (error) {
            logger.error({ kind: 'infra', component: COMPONENT, message: 'Local model request error', error, meta: { model: params.model } });
            return { success: false, error: toErrorMessage(error) };
        }
    }
}
