import type { ChatSession } from '../../features/chat/domain/ChatSession.js';
import type { ChatMessage, MessageRole, MessageStatus } from '../../features/chat/domain/ChatMessage.js';
import { isToolOperationType, type ToolOperation, type ToolOperationStatus } from '../../features/chat/domain/ToolOperation.js';
import type { AIProvider, UserPreferences } from '../../features/preferences/domain/UserPreferences.js';
import { StoreError } from '../../platform/errors.js';

// 数据库行 → 领域对象；字段缺失或类型不符直接抛 StoreError

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant', 'system'];
const MESSAGE_STATUSES: readonly MessageStatus[] = ['pending', 'processing', 'completed', 'error'];
const OPERATION_STATUSES: readonly ToolOperationStatus[] = ['pending', 'success', 'error', 'timeout'];
const PROVIDERS: readonly AIProvider[] = ['hosted', 'local'];

function requireRow(table: string, row: unknown): Record<string, unknown> {
    if (!isRecord(row)) {
        throw new StoreError(`${table}: row must be an object`);
    }
    return row;
}

function str(table: string, row: Record<string, unknown>, field: string): string {
    const value = row[field];
    if (typeof value !== 'string') {
        throw new StoreError(`${table}.${field} must be string`);
    }
    return value;
}

/** 可空文本列：null 视为空字符串 */
function text(row: Record<string, unknown>, field: string): string {
    const value = row[field];
    return typeof value === 'string' ? value : '';
}

function num(table: string, row: Record<string, unknown>, field: string): number {
    const value = row[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new StoreError(`${table}.${field} must be number`);
    }
    return value;
}

function nullableNum(row: Record<string, unknown>, field: string): number | null {
    const value = row[field];
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function bool(table: string, row: Record<string, unknown>, field: string): boolean {
    const value = row[field];
    if (typeof value !== 'boolean') {
        throw new StoreError(`${table}.${field} must be boolean`);
    }
    return value;
}

function jsonObject(row: Record<string, unknown>, field: string): Record<string, unknown> {
    const value = row[field];
    return isRecord(value) ? { ...value } : {};
}

function oneOf<T extends string>(table: string, row: Record<string, unknown>, field: string, allowed: readonly T[]): T {
    const value = row[field];
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
        throw new StoreError(`${table}.${field} has unexpected value: ${String(value)}`);
    }
    return match;
}

export function mapSessionRow(raw: unknown): ChatSession {
    const table = 'chat_sessions';
    const row = requireRow(table, raw);
    const mcpSessionId = row.mcp_session_id;
    return {
        id: str(table, row, 'id'),
        user_id: str(table, row, 'user_id'),
        title: text(row, 'title'),
        created_at: str(table, row, 'created_at'),
        updated_at: str(table, row, 'updated_at'),
        is_active: bool(table, row, 'is_active'),
        metadata: jsonObject(row, 'metadata'),
        mcp_session_id: typeof mcpSessionId === 'string' && mcpSessionId.length > 0 ? mcpSessionId : null,
    };
}

export function mapMessageRow(raw: unknown): ChatMessage {
    const table = 'chat_messages';
    const row = requireRow(table, raw);
    return {
        id: str(table, row, 'id'),
        session_id: str(table, row, 'session_id'),
        role: oneOf(table, row, 'role', MESSAGE_ROLES),
        content: text(row, 'content'),
        timestamp: str(table, row, 'timestamp'),
        status: oneOf(table, row, 'status', MESSAGE_STATUSES),
        model_used: text(row, 'model_used'),
        tokens_used: nullableNum(row, 'tokens_used'),
        error_message: text(row, 'error_message'),
        trace_id: text(row, 'trace_id'),
        span_id: text(row, 'span_id'),
    };
}

export function mapToolOperationRow(raw: unknown): ToolOperation {
    const table = 'chat_tool_operations';
    const row = requireRow(table, raw);
    const operationType = row.operation_type;
    if (!isToolOperationType(operationType)) {
        throw new StoreError(`${table}.operation_type has unexpected value: ${String(operationType)}`);
    }
    return {
        id: str(table, row, 'id'),
        message_id: str(table, row, 'message_id'),
        operation_type: operationType,
        parameters: jsonObject(row, 'parameters'),
        response: jsonObject(row, 'response'),
        status: oneOf(table, row, 'status', OPERATION_STATUSES),
        duration_ms: nullableNum(row, 'duration_ms'),
        timestamp: str(table, row, 'timestamp'),
        error_details: text(row, 'error_details'),
    };
}

export function mapPreferencesRow(raw: unknown): UserPreferences {
    const table = 'chat_user_preferences';
    const row = requireRow(table, raw);
    return {
        user_id: str(table, row, 'user_id'),
        preferred_ai_provider: oneOf(table, row, 'preferred_ai_provider', PROVIDERS),
        hosted_model: str(table, row, 'hosted_model'),
        local_model: str(table, row, 'local_model'),
        max_tokens: num(table, row, 'max_tokens'),
        temperature: num(table, row, 'temperature'),
        theme: str(table, row, 'theme'),
        show_timestamps: bool(table, row, 'show_timestamps'),
        show_token_usage: bool(table, row, 'show_token_usage'),
        show_mcp_operations: bool(table, row, 'show_mcp_operations'),
        created_at: str(table, row, 'created_at'),
        updated_at: str(table, row, 'updated_at'),
    };
}
