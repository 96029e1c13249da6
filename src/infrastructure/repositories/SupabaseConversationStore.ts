import type { SupabaseClient } from '@supabase/supabase-js';
import type { ConversationStore } from '../../core/ports/ConversationStore.js';
import type { ChatSession, ChatSessionPatch, NewChatSession } from '../../features/chat/domain/ChatSession.js';
import type { ChatMessage, ChatMessagePatch, MessageRole, MessageStatus, NewChatMessage } from '../../features/chat/domain/ChatMessage.js';
import type { NewToolOperation, ToolOperation, ToolOperationResult } from '../../features/chat/domain/ToolOperation.js';
import type { UserPreferences } from '../../features/preferences/domain/UserPreferences.js';
import { StoreError } from '../../platform/errors.js';
import { logger } from '../../platform/logger.js';
import { mapMessageRow, mapPreferencesRow, mapSessionRow, mapToolOperationRow } from '../supabase/RowMapper.js';

const COMPONENT = 'SupabaseConversationStore';

const TABLES = {
    sessions: 'chat_sessions',
    messages: 'chat_messages',
    operations: 'chat_tool_operations',
    preferences: 'chat_user_preferences',
} as const;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
/** Postgres 22P02: invalid input syntax (如非法 uuid) */
const INVALID_TEXT_REPRESENTATION = '22P02';

/** PostgrestError 的结构子集 */
interface DbError {
    message: string;
    code?: string;
    hint?: string;
    details?: string;
}

/**
 * Layer D: Adapter - 使用 Supabase 实现 ConversationStore
 * 表结构见 supabase/schema.sql；id / timestamp 由数据库生成
 */
export class SupabaseConversationStore implements ConversationStore {
    constructor(private readonly client: SupabaseClient) {}

    private fail(action: string, error: DbError | null, meta?: Record<string, unknown>): never {
        const reason = error ? `${error.message} (code: ${error.code ?? '-'})` : 'no row returned';
        logger.error({
            kind: 'infra',
            component: COMPONENT,
            message: `Failed to ${action}: ${reason}`,
            meta: { hint: error?.hint, details: error?.details, ...meta },
        });
        throw new StoreError(`Failed to ${action}: ${error?.message ?? 'no row returned'}`, { cause: error ?? undefined });
    }

    // ============ Sessions ============

    async createSession(input: NewChatSession): Promise<ChatSession> {
        const { data, error } = await this.client
            .from(TABLES.sessions)
            .insert({
                user_id: input.user_id,
                title: input.title ?? '',
                metadata: input.metadata ?? {},
                mcp_session_id: input.mcp_session_id ?? null,
            })
            .select('*')
            .single();

        if (error || !data) this.fail('create session', error, { userId: input.user_id });
        logger.debug({ kind: 'infra', component: COMPONENT, message: 'Session created', meta: { id: data.id } });
        return mapSessionRow(data);
    }

    async getSession(sessionId: string): Promise<ChatSession | null> {
        // id 列是 uuid：格式不对的 id 不可能存在，不发请求
        if (!UUID_PATTERN.test(sessionId)) return null;

        const { data, error } = await this.client
            .from(TABLES.sessions)
            .select('*')
            .eq('id', sessionId)
            .maybeSingle();

        if (error?.code === INVALID_TEXT_REPRESENTATION) return null;
        if (error) this.fail('get session', error, { sessionId });
        return data ? mapSessionRow(data) : null;
    }

    async listActiveSessions(userId: string): Promise<ChatSession[]> {
        const { data, error } = await this.client
            .from(TABLES.sessions)
            .select('*')
            .eq('user_id', userId)
            .eq('is_active', true)
            .order('updated_at', { ascending: false });

        if (error || !data) this.fail('list sessions', error, { userId });
        return data.map(mapSessionRow);
    }

    async updateSession(sessionId: string, patch: ChatSessionPatch): Promise<ChatSession> {
        const { data, error } = await this.client
            .from(TABLES.sessions)
            .update(patch)
            .eq('id', sessionId)
            .select('*')
            .single();

        if (error || !data) this.fail('update session', error, { sessionId });
        return mapSessionRow(data);
    }

    // ============ Messages ============

    async appendMessage(input: NewChatMessage): Promise<ChatMessage> {
        const { data, error } = await this.client
            .from(TABLES.messages)
            .insert({
                session_id: input.session_id,
                role: input.role,
                content: input.content,
                status: input.status,
                trace_id: input.trace_id ?? '',
                span_id: input.span_id ?? '',
            })
            .select('*')
            .single();

        if (error || !data) this.fail('append message', error, { sessionId: input.session_id, role: input.role });
        return mapMessageRow(data);
    }

    async updateMessage(messageId: string, patch: ChatMessagePatch): Promise<ChatMessage> {
        const { data, error } = await this.client
            .from(TABLES.messages)
            .update(patch)
            .eq('id', messageId)
            .select('*')
            .single();

        if (error || !data) this.fail('update message', error, { messageId });
        return mapMessageRow(data);
    }

    async listMessages(sessionId: string): Promise<ChatMessage[]> {
        const { data, error } = await this.client
            .from(TABLES.messages)
            .select('*')
            .eq('session_id', sessionId)
            .order('timestamp', { ascending: true })
            .order('seq', { ascending: true });

        if (error || !data) this.fail('list messages', error, { sessionId });
        return data.map(mapMessageRow);
    }

    async listRecentMessages(sessionId: string, status: MessageStatus, limit: number): Promise<ChatMessage[]> {
        const { data, error } = await this.client
            .from(TABLES.messages)
            .select('*')
            .eq('session_id', sessionId)
            .eq('status', status)
            .order('timestamp', { ascending: false })
            .order('seq', { ascending: false })
            .limit(limit);

        if (error || !data) this.fail('list recent messages', error, { sessionId, limit });
        return data.map(mapMessageRow);
    }

    async findFirstMessage(sessionId: string, role: MessageRole): Promise<ChatMessage | null> {
        const { data, error } = await this.client
            .from(TABLES.messages)
            .select('*')
            .eq('session_id', sessionId)
            .eq('role', role)
            .order('timestamp', { ascending: true })
            .order('seq', { ascending: true })
            .limit(1)
            .maybeSingle();

        if (error) this.fail('find first message', error, { sessionId, role });
        return data ? mapMessageRow(data) : null;
    }

    // ============ Tool operations ============

    async createToolOperation(input: NewToolOperation): Promise<ToolOperation> {
        const { data, error } = await this.client
            .from(TABLES.operations)
            .insert({
                message_id: input.message_id,
                operation_type: input.operation_type,
                parameters: input.parameters,
                response: {},
                status: 'pending',
            })
            .select('*')
            .single();

        if (error || !data) this.fail('create tool operation', error, { messageId: input.message_id });
        return mapToolOperationRow(data);
    }

    async finalizeToolOperation(operationId: string, result: ToolOperationResult): Promise<ToolOperation> {
        // 条件更新：只有 pending 行会被改写，保证只前进一次
        const { data, error } = await this.client
            .from(TABLES.operations)
            .update(result)
            .eq('id', operationId)
            .eq('status', 'pending')
            .select('*')
            .maybeSingle();

        if (error || !data) this.fail('finalize tool operation', error, { operationId, status: result.status });
        return mapToolOperationRow(data);
    }

    async listToolOperations(sessionId: string): Promise<ToolOperation[]> {
        const { data, error } = await this.client
            .from(TABLES.operations)
            .select('*, chat_messages!inner(session_id)')
            .eq('chat_messages.session_id', sessionId)
            .order('timestamp', { ascending: false });

        if (error || !data) this.fail('list tool operations', error, { sessionId });
        return data.map(mapToolOperationRow);
    }

    // ============ Preferences ============

    async getPreferences(userId: string): Promise<UserPreferences | null> {
        const { data, error } = await this.client
            .from(TABLES.preferences)
            .select('*')
            .eq('user_id', userId)
            .maybeSingle();

        if (error) this.fail('get preferences', error, { userId });
        return data ? mapPreferencesRow(data) : null;
    }

    async ensurePreferences(defaults: UserPreferences): Promise<UserPreferences> {
        // 按 user_id 插入，已存在则忽略，保证幂等
        const { error } = await this.client
            .from(TABLES.preferences)
            .upsert(defaults, { onConflict: 'user_id', ignoreDuplicates: true });

        if (error) this.fail('ensure preferences', error, { userId: defaults.user_id });

        const stored = await this.getPreferences(defaults.user_id);
        if (!stored) this.fail('ensure preferences', null, { userId: defaults.user_id });
        return stored;
    }

    async savePreferences(preferences: UserPreferences): Promise<UserPreferences> {
        const { data, error } = await this.client
            .from(TABLES.preferences)
            .upsert(preferences, { onConflict: 'user_id' })
            .select('*')
            .single();

        if (error || !data) this.fail('save preferences', error, { userId: preferences.user_id });
        return mapPreferencesRow(data);
    }
}
