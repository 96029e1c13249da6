export type MessageRole = 'user' | 'assistant' | 'system';

export type MessageStatus = 'pending' | 'processing' | 'completed' | 'error';

export interface ChatMessage {
    id: string;
    session_id: string;
    role: MessageRole;
    content: string;
    /** 追加顺序即时间顺序，创建后不再变化 */
    timestamp: string;
    status: MessageStatus;
    model_used: string;
    /** null = 未知 (本地模型不返回用量) */
    tokens_used: number | null;
    error_message: string;
    trace_id: string;
    span_id: string;
}

export interface NewChatMessage {
    session_id: string;
    role: MessageRole;
    content: string;
    status: MessageStatus;
    trace_id?: string;
    span_id?: string;
}

/**
 * 只允许修改进行中消息的这些字段
 */
export type ChatMessagePatch = Partial<Pick<ChatMessage, 'content' | 'status' | 'model_used' | 'tokens_used' | 'error_message'>>;

export function isTerminalStatus(status: MessageStatus): boolean {
    return status === 'completed' || status === 'error';
}
