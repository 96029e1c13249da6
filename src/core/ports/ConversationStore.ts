import type { ChatSession, ChatSessionPatch, NewChatSession } from '../../features/chat/domain/ChatSession.js';
import type { ChatMessage, ChatMessagePatch, MessageRole, MessageStatus, NewChatMessage } from '../../features/chat/domain/ChatMessage.js';
import type { NewToolOperation, ToolOperation, ToolOperationResult } from '../../features/chat/domain/ToolOperation.js';
import type { UserPreferences } from '../../features/preferences/domain/UserPreferences.js';

/**
 * Layer C: Port - 会话/消息/工具调用/偏好的持久化
 * 不关心具体实现（Supabase / 内存）；所有写操作失败抛 StoreError
 */
export interface ConversationStore {
    createSession(input: NewChatSession): Promise<ChatSession>;
    getSession(sessionId: string): Promise<ChatSession | null>;
    /** 仅返回 is_active 的会话，按 updated_at 倒序 */
    listActiveSessions(userId: string): Promise<ChatSession[]>;
    updateSession(sessionId: string, patch: ChatSessionPatch): Promise<ChatSession>;

    appendMessage(input: NewChatMessage): Promise<ChatMessage>;
    updateMessage(messageId: string, patch: ChatMessagePatch): Promise<ChatMessage>;
    /** 时间正序 */
    listMessages(sessionId: string): Promise<ChatMessage[]>;
    /** 按时间倒序取最近 limit 条指定状态的消息 */
    listRecentMessages(sessionId: string, status: MessageStatus, limit: number): Promise<ChatMessage[]>;
    findFirstMessage(sessionId: string, role: MessageRole): Promise<ChatMessage | null>;

    createToolOperation(input: NewToolOperation): Promise<ToolOperation>;
    /** pending → 终态，只允许一次 */
    finalizeToolOperation(operationId: string, result: ToolOperationResult): Promise<ToolOperation>;
    /** 会话下所有消息的工具调用，按时间倒序 */
    listToolOperations(sessionId: string): Promise<ToolOperation[]>;

    getPreferences(userId: string): Promise<UserPreferences | null>;
    /** 不存在时插入 defaults，已存在则原样返回 (幂等) */
    ensurePreferences(defaults: UserPreferences): Promise<UserPreferences>;
    savePreferences(preferences: UserPreferences): Promise<UserPreferences>;
}
