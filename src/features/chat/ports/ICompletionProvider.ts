import type { MessageRole } from '../domain/ChatMessage.js';
import type { AIProvider } from '../../preferences/domain/UserPreferences.js';

/** 发送给模型的一条上下文消息 */
export interface ChatTurn {
    role: MessageRole;
    content: string;
}

export type CompletionResult =
    | {
        success: true;
        content: string;
        model: string;
        /** null = 上游未报告用量 */
        tokensUsed: number | null;
    }
    | {
        success: false;
        error: string;
    };

/**
 * Layer C: Port - 文本生成能力
 * 实现方不得抛出异常，所有失败都以 success=false 返回
 */
export interface ICompletionProvider {
    generate(
        messages: ChatTurn[],
        provider: AIProvider,
        model: string,
        maxTokens: number,
        temperature: number
    ): Promise<CompletionResult>;
}
