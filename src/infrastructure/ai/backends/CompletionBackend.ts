import type { AIProvider } from '../../../features/preferences/domain/UserPreferences.js';
import type { ChatTurn, CompletionResult } from '../../../features/chat/ports/ICompletionProvider.js';

export interface CompletionParams {
    model: string;
    maxTokens: number;
    temperature: number;
}

/**
 * 单个后端的生成能力；由 CompletionProvider 按 provider 标签分发
 */
export interface CompletionBackend {
    readonly provider: AIProvider;
    /** 是否具备调用条件 (如凭证) */
    isAvailable(): boolean;
    complete(messages: ChatTurn[], params: CompletionParams): Promise<CompletionResult>;
}
