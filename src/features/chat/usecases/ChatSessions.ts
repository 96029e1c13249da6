import type { ConversationStore } from '../../../core/ports/ConversationStore.js';
import { resolveDisplayTitle, type ChatSession } from '../domain/ChatSession.js';
import type { ChatMessage } from '../domain/ChatMessage.js';
import type { ToolOperation } from '../domain/ToolOperation.js';
import { NotFoundError } from '../../../platform/errors.js';
import { bizLog } from '../../../platform/logger.js';

const COMPONENT = 'ChatSessions';

export interface SessionSummary {
    session: ChatSession;
    display_title: string;
}

export interface SessionHistory {
    session_id: string;
    title: string;
    messages: ChatMessage[];
}

export interface SessionOperations {
    session_id: string;
    operations: ToolOperation[];
}

/**
 * Layer 2 Usecase: 会话管理
 * 所有按 ID 的访问都校验归属，非本人会话一律视为不存在
 */
export class ChatSessions {
    constructor(private readonly store: ConversationStore) {}

    async createSession(userId: string): Promise<ChatSession> {
        const session = await this.store.createSession({ user_id: userId });
        bizLog(COMPONENT, 'Session created', { sessionId: session.id });
        return session;
    }

    async listSessions(userId: string): Promise<SessionSummary[]> {
        const sessions = await this.store.listActiveSessions(userId);
        return Promise.all(sessions.map(async (session) => ({
            session,
            display_title: await this.displayTitle(session),
        })));
    }

    async getSession(userId: string, sessionId: string): Promise<ChatSession> {
        const session = await this.store.getSession(sessionId);
        if (!session || session.user_id !== userId) {
            throw new NotFoundError(`Session not found: ${sessionId}`);
        }
        return session;
    }

    async getHistory(userId: string, sessionId: string): Promise<SessionHistory> {
        const session = await this.getSession(userId, sessionId);
        const messages = await this.store.listMessages(session.id);
        const firstUser = messages.find((message) => message.role === 'user');
        return {
            session_id: session.id,
            title: resolveDisplayTitle(session, firstUser?.content),
            messages,
        };
    }

    async listOperations(userId: string, sessionId: string): Promise<SessionOperations> {
        const session = await this.getSession(userId, sessionId);
        return {
            session_id: session.id,
            operations: await this.store.listToolOperations(session.id),
        };
    }

    /**
     * 软删除：只清除 is_active，数据保留
     */
    async deleteSession(userId: string, sessionId: string): Promise<ChatSession> {
        const session = await this.getSession(userId, sessionId);
        const updated = await this.store.updateSession(session.id, { is_active: false });
        bizLog(COMPONENT, 'Session soft-deleted', { sessionId: session.id });
        return updated;
    }

    private async displayTitle(session: ChatSession): Promise<string> {
        if (session.title) return session.title;
        const firstUser = await this.store.findFirstMessage(session.id, 'user');
        return resolveDisplayTitle(session, firstUser?.content);
    }
}
