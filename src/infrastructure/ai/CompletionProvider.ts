import type { ChatTurn, CompletionResult, ICompletionProvider } from '../../features/chat/ports/ICompletionProvider.js';
import type { AIProvider } from '../../features/preferences/domain/UserPreferences.js';
import { logger } from '../../platform/logger.js';
import type { CompletionBackend } from './backends/CompletionBackend.js';

const COMPONENT = 'CompletionProvider';

export interface CompletionBackends {
    hosted: CompletionBackend;
    local: CompletionBackend;
}

/**
 * 按 provider 标签分发到两个固定后端
 * 后端不可用时直接返回 "provider not available"，不发起请求
 */
export class CompletionProvider implements ICompletionProvider {
    constructor(private readonly backends: CompletionBackends) {}

    async generate(
        messages: ChatTurn[],
        provider: AIProvider,
        model: string,
        maxTokens: number,
        temperature: number
    ): Promise<CompletionResult> {
        const backend = this.selectBackend(provider);

        if (!backend.isAvailable()) {
            logger.warn({ kind: 'infra', component: COMPONENT, message: 'Provider not available', meta: { provider } });
            return { success: false, error: 'provider not available' };
        }

        const startedAt = Date.now();
        const result = await backend.complete(messages, { model, maxTokens, temperature });

        logger.info({
            kind: 'infra',
            component: COMPONENT,
            message: result.success ? 'Completion generated' : 'Completion failed',
            meta: {
                provider,
                model,
                contextLength: messages.length,
                latencyMs: Date.now() - startedAt,
                ...(result.success ? { tokensUsed: result.tokensUsed } : { error: result.error }),
            },
        });

        return result;
    }

    private selectBackend(provider: AIProvider): CompletionBackend {
        switch (provider) {
            case 'hosted':
                return this.backends.hosted;
            case 'local':
                return this.backends.local;
        }
    }
}
