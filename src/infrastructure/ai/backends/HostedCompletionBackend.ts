import type { ChatTurn, CompletionResult } from '../../../features/chat/ports/ICompletionProvider.js';
import { logger } from '../../../platform/logger.js';
import { toErrorMessage } from '../../../platform/errors.js';
import { fetchWithTimeout, isRecord, parseJsonText, type HttpFetch } from '../../networking/HttpClient.js';
import type { CompletionBackend, CompletionParams } from './CompletionBackend.js';

const COMPONENT = 'HostedCompletionBackend';

export interface HostedBackendOptions {
    apiKey: string;
    /** OpenAI 兼容 API 根路径，如 https://api.openai.com/v1 */
    baseUrl: string;
    timeoutMs: number;
    fetch: HttpFetch;
}

/**
 * Layer D: Adapter - 托管 Chat Completions API (OpenAI 兼容协议)
 */
export class HostedCompletionBackend implements CompletionBackend {
    readonly provider = 'hosted' as const;

    constructor(private readonly options: HostedBackendOptions) {}

    isAvailable(): boolean {
        return this.options.apiKey.length > 0;
    }

    async complete(messages: ChatTurn[], params: CompletionParams): Promise<CompletionResult> {
        const url = `${this.options.baseUrl}/chat/completions`;
        const payload = {
            model: params.model,
            messages,
            max_tokens: params.maxTokens,
            temperature: params.temperature,
        };

        try {
            const reply = await fetchWithTimeout(
                this.options.fetch,
                url,
                {
                    method: 'POST',
                    headers: {
                        Authorization: `Bearer ${this.options.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify(payload),
                },
                this.options.timeoutMs
            );

            if (!reply.ok) {
                const errText = reply.text;
                logger.error({
                    kind: 'infra',
                    component: COMPONENT,
                    message: 'Completion request failed',
                    meta: { status: reply.status, model: params.model },
                });
                return { success: false, error: `HTTP ${reply.status}: ${errText}` };
            }

            const body = parseJsonText(reply.text);
            const content = extractContent(body);
            if (content === null) {
                return { success: false, error: 'Malformed completion response: missing choices[0].message.content' };
            }

            return {
                success: true,
                content,
                model: params.model,
                tokensUsed: extractTotalTokens(body),
            };
        } catch (error) {
            logger.error({ kind: 'infra', component: COMPONENT, message: 'Completion request error', error, meta: { model: params.model } });
            return { success: false, error: toErrorMessage(error) };
        }
    }
}

function extractContent(body: unknown): string | null {
    if (!isRecord(body) || !Array.isArray(body.choices)) return null;
    const first: unknown = body.choices[0];
    if (!isRecord(first) || !isRecord(first.message)) return null;
    const content = first.message.content;
    return typeof content === 'string' ? content : null;
}

function extractTotalTokens(body: unknown): number | null {
    if (!isRecord(body) || !isRecord(body.usage)) return null;
    const total = body.usage.total_tokens;
    return typeof total === 'number' && Number.isFinite(total) ? total : null;
}
