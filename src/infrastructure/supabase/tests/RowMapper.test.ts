import { describe, it, expect } from 'vitest';
import { mapMessageRow, mapPreferencesRow, mapSessionRow, mapToolOperationRow } from '../RowMapper.js';
import { StoreError } from '../../../platform/errors.js';

describe('RowMapper', () => {
    it('会话行：null 标题与空 mcp_session_id 归一化', () => {
        expect(mapSessionRow({
            id: 's1',
            user_id: 'u1',
            title: null,
            created_at: '2024-01-01T00:00:00+00:00',
            updated_at: '2024-01-01T00:00:00+00:00',
            is_active: true,
            metadata: null,
            mcp_session_id: '',
        })).toEqual({
            id: 's1',
            user_id: 'u1',
            title: '',
            created_at: '2024-01-01T00:00:00+00:00',
            updated_at: '2024-01-01T00:00:00+00:00',
            is_active: true,
            metadata: {},
            mcp_session_id: null,
        });
    });

    it('消息行：tokens_used 为 null 保持 null，多余列忽略', () => {
        const message = mapMessageRow({
            id: 'm1',
            session_id: 's1',
            role: 'assistant',
            content: 'hi',
            timestamp: '2024-01-01T00:00:01+00:00',
            status: 'completed',
            model_used: 'llama2',
            tokens_used: null,
            error_message: null,
            trace_id: 't',
            span_id: 'sp',
            seq: 12,
        });
        expect(message).toEqual({
            id: 'm1',
            session_id: 's1',
            role: 'assistant',
            content: 'hi',
            timestamp: '2024-01-01T00:00:01+00:00',
            status: 'completed',
            model_used: 'llama2',
            tokens_used: null,
            error_message: '',
            trace_id: 't',
            span_id: 'sp',
        });
    });

    it('未知角色抛 StoreError', () => {
        expect(() => mapMessageRow({ id: 'm1', session_id: 's1', role: 'tool', timestamp: 'x', status: 'completed' }))
            .toThrow(new StoreError('chat_messages.role has unexpected value: tool'));
    });

    it('工具调用行：未知 operation_type 抛 StoreError', () => {
        expect(() => mapToolOperationRow({ id: 'o1', message_id: 'm1', operation_type: 'kv_nuke' }))
            .toThrow('chat_tool_operations.operation_type has unexpected value: kv_nuke');
    });

    it('工具调用行：正常映射', () => {
        expect(mapToolOperationRow({
            id: 'o1',
            message_id: 'm1',
            operation_type: 'store_aggregate',
            parameters: { pipeline: [] },
            response: {},
            status: 'timeout',
            duration_ms: 30000,
            timestamp: '2024-01-01T00:00:02+00:00',
            error_details: 'Request timed out after 30s',
            chat_messages: { session_id: 's1' },
        })).toEqual({
            id: 'o1',
            message_id: 'm1',
            operation_type: 'store_aggregate',
            parameters: { pipeline: [] },
            response: {},
            status: 'timeout',
            duration_ms: 30000,
            timestamp: '2024-01-01T00:00:02+00:00',
            error_details: 'Request timed out after 30s',
        });
    });

    it('偏好行：非法 provider 抛 StoreError', () => {
        expect(() => mapPreferencesRow({ user_id: 'u1', preferred_ai_provider: 'openai' }))
            .toThrow('chat_user_preferences.preferred_ai_provider has unexpected value: openai');
    });

    it('非对象行抛 StoreError', () => {
        expect(() => mapSessionRow(null)).toThrow(StoreError);
    });
});
