import { nanoid } from 'nanoid';
import type { ConversationStore } from '../../core/ports/ConversationStore.js';
import type { ChatSession, ChatSessionPatch, NewChatSession } from '../../features/chat/domain/ChatSession.js';
import type { ChatMessage, ChatMessagePatch, MessageRole, MessageStatus, NewChatMessage } from '../../features/chat/domain/ChatMessage.js';
import type { NewToolOperation, ToolOperation, ToolOperationResult } from '../../features/chat/domain/ToolOperation.js';
import type { UserPreferences } from '../../features/preferences/domain/UserPreferences.js';
import { StoreError } from '../../platform/errors.js';

const byTimestamp = <T extends { timestamp: string }>(a: T, b: T) => a.timestamp.localeCompare(b.timestamp);

/**
 * Layer D: Adapter - 进程内存储
 * 用于测试，以及未配置 Supabase 时的本地运行 (进程退出即丢失)
 *
 * 返回值都是拷贝，调用方修改不会影响内部状态
 */
export class InMemoryConversationStore implements ConversationStore {
    private sessions = new Map<string, ChatSession>();
    // 插入顺序 = 追加顺序，时间戳相同时据此排序
    private messages: ChatMessage[] = [];
    private operations: ToolOperation[] = [];
    private preferences = new Map<string, UserPreferences>();

    constructor(private readonly now: () => Date = () => new Date()) {}

    private timestamp(): string {
        return this.now().toISOString();
    }

    // ============ Sessions ============

    async createSession(input: NewChatSession): Promise<ChatSession> {
        const createdAt = this.timestamp();
        const session: ChatSession = {
            id: nanoid(),
            user_id: input.user_id,
            title: input.title ?? '',
            created_at: createdAt,
            updated_at: createdAt,
            is_active: true,
            metadata: { ...(input.metadata ?? {}) },
            mcp_session_id: input.mcp_session_id ?? null,
        };
        this.sessions.set(session.id, session);
        return cloneSession(session);
    }

    async getSession(sessionId: string): Promise<ChatSession | null> {
        const session = this.sessions.get(sessionId);
        return session ? cloneSession(session) : null;
    }

    async listActiveSessions(userId: string): Promise<ChatSession[]> {
        return [...this.sessions.values()]
            .filter((session) => session.user_id === userId && session.is_active)
            .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
            .map(cloneSession);
    }

    async updateSession(sessionId: string, patch: ChatSessionPatch): Promise<ChatSession> {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new StoreError(`Session not found: ${sessionId}`);
        }
        const updated: ChatSession = {
            ...session,
            ...patch,
            metadata: { ...(patch.metadata ?? session.metadata) },
        };
        this.sessions.set(sessionId, updated);
        return cloneSession(updated);
    }

    // ============ Messages ============

    async appendMessage(input: NewChatMessage): Promise<ChatMessage> {
        if (!this.sessions.has(input.session_id)) {
            throw new StoreError(`Session not found: ${input.session_id}`);
        }
        const message: ChatMessage = {
            id: nanoid(),
            session_id: input.session_id,
            role: input.role,
            content: input.content,
            timestamp: this.timestamp(),
            status: input.status,
            model_used: '',
            tokens_used: null,
            error_message: '',
            trace_id: input.trace_id ?? '',
            span_id: input.span_id ?? '',
        };
        this.messages.push(message);
        return { ...message };
    }

    async updateMessage(messageId: string, patch: ChatMessagePatch): Promise<ChatMessage> {
        const index = this.messages.findIndex((message) => message.id === messageId);
        if (index < 0) {
            throw new StoreError(`Message not found: ${messageId}`);
        }
        const updated: ChatMessage = { ...this.messages[index], ...patch };
        this.messages[index] = updated;
        return { ...updated };
    }

    async listMessages(sessionId: string): Promise<ChatMessage[]> {
        return this.messages
            .filter((message) => message.session_id === sessionId)
            .sort(byTimestamp)
            .map((message) => ({ ...message }));
    }

    async listRecentMessages(sessionId: string, status: MessageStatus, limit: number): Promise<ChatMessage[]> {
        const matching = (await this.listMessages(sessionId)).filter((message) => message.status === status);
        return matching.slice(Math.max(0, matching.length - limit)).reverse();
    }

    async findFirstMessage(sessionId: string, role: MessageRole): Promise<ChatMessage | null> {
        const messages = await this.listMessages(sessionId);
        return messages.find((message) => message.role === role) ?? null;
    }

    // ============ Tool operations ============

    async createToolOperation(input: NewToolOperation): Promise<ToolOperation> {
        if (!this.messages.some((message) => message.id === input.message_id)) {
            throw new StoreError(`Message not found: ${input.message_id}`);
        }
        const operation: ToolOperation = {
            id: nanoid(),
            message_id: input.message_id,
            operation_type: input.operation_type,
            parameters: { ...input.parameters },
            response: {},
            status: 'pending',
            duration_ms: null,
            timestamp: this.timestamp(),
            error_details: '',
        };
        this.operations.push(operation);
        return cloneOperation(operation);
    }

    async finalizeToolOperation(operationId: string, result: ToolOperationResult): Promise<ToolOperation> {
        const index = this.operations.findIndex((operation) => operation.id === operationId);
        if (index < 0) {
            throw new StoreError(`Tool operation not found: ${operationId}`);
        }
        const current = this.operations[index];
        if (current.status !== 'pending') {
            throw new StoreError(`Tool operation already finalized: ${operationId} (${current.status})`);
        }
        const updated: ToolOperation = { ...current, ...result, response: { ...result.response } };
        this.operations[index] = updated;
        return cloneOperation(updated);
    }

    async listToolOperations(sessionId: string): Promise<ToolOperation[]> {
        const messageIds = new Set(
            this.messages.filter((message) => message.session_id === sessionId).map((message) => message.id)
        );
        return this.operations
            .filter((operation) => messageIds.has(operation.message_id))
            .sort(byTimestamp)
            .reverse()
            .map(cloneOperation);
    }

    // ============ Preferences ============

    async getPreferences(userId: string): Promise<UserPreferences | null> {
        const preferences = this.preferences.get(userId);
        return preferences ? { ...preferences } : null;
    }

    async ensurePreferences(defaults: UserPreferences): Promise<UserPreferences> {
        const existing = this.preferences.get(defaults.user_id);
        if (existing) {
            return { ...existing };
        }
        this.preferences.set(defaults.user_id, { ...defaults });
        return { ...defaults };
    }

    async savePreferences(preferences: UserPreferences): Promise<UserPreferences> {
        this.preferences.set(preferences.user_id, { ...preferences });
        return { ...preferences };
    }
}

function cloneSession(session: ChatSession): ChatSession {
    return { ...session, metadata: { ...session.metadata } };
}

function cloneOperation(operation: ToolOperation): ToolOperation {
    return { ...operation, parameters: { ...operation.parameters }, response: { ...operation.response } };
}
