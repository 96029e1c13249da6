/**
 * Layer A: Domain - 会话实体与标题规则
 * 纯业务规则，不涉及 IO
 */

export interface ChatSession {
    id: string;
    user_id: string;
    /** 空字符串表示尚未设置，首条用户消息会写入 */
    title: string;
    created_at: string;
    updated_at: string;
    /** 软删除标记 */
    is_active: boolean;
    metadata: Record<string, unknown>;
    /** MCP 侧会话关联 ID，为空时使用 chat session id */
    mcp_session_id: string | null;
}

export interface NewChatSession {
    user_id: string;
    title?: string;
    metadata?: Record<string, unknown>;
    mcp_session_id?: string | null;
}

export type ChatSessionPatch = Partial<Pick<ChatSession, 'title' | 'updated_at' | 'is_active' | 'metadata' | 'mcp_session_id'>>;

export const TITLE_MAX_LENGTH = 50;

/**
 * 规则：由用户输入生成会话标题 (超长截断 + "...")
 * 按码点计数，不会把 emoji 等代理对截成半个
 */
export function buildSessionTitle(text: string, maxLength: number = TITLE_MAX_LENGTH): string {
    const chars = Array.from(text);
    return chars.length > maxLength ? `${chars.slice(0, maxLength).join('')}...` : text;
}

/**
 * 规则：展示用标题
 * title > 首条用户消息 > "Chat YYYY-MM-DD HH:mm"
 */
export function resolveDisplayTitle(session: ChatSession, firstUserContent?: string | null): string {
    if (session.title) return session.title;
    if (firstUserContent) return buildSessionTitle(firstUserContent);
    return `Chat ${session.created_at.slice(0, 16).replace('T', ' ')}`;
}

/** MCP 调用使用的会话 ID */
export function resolveMcpSessionId(session: ChatSession): string {
    return session.mcp_session_id || session.id;
}
