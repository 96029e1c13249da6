import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ChatOrchestrator } from '../ChatOrchestrator.js';
import { InMemoryConversationStore } from '../../../../infrastructure/memory/InMemoryConversationStore.js';
import { createDefaultPreferences, type UserPreferences } from '../../../preferences/domain/UserPreferences.js';
import { SYSTEM_PROMPT } from '../../domain/ConversationContext.js';
import type { ChatSession } from '../../domain/ChatSession.js';
import { ValidationError } from '../../../../platform/errors.js';
import { StubCompletionProvider, StubToolBridge, steppingClock } from './stubs.js';

const USER = 'user_1';

describe('ChatOrchestrator.processMessage', () => {
    let store: InMemoryConversationStore;
    let session: ChatSession;
    let preferences: UserPreferences;

    beforeEach(async () => {
        store = new InMemoryConversationStore(steppingClock());
        session = await store.createSession({ user_id: USER });
        preferences = createDefaultPreferences(USER, '2024-01-01T00:00:00.000Z');
    });

    it('成功：落库用户消息与 assistant 回复，更新会话', async () => {
        const provider = new StubCompletionProvider({ success: true, content: 'Hi there!', model: 'gpt-3.5-turbo', tokensUsed: 15 });
        const orchestrator = new ChatOrchestrator(store, provider, new StubToolBridge());

        const assistant = await orchestrator.processMessage(session, '  Hello  ', preferences);

        expect(assistant).toMatchObject({
            role: 'assistant',
            content: 'Hi there!',
            status: 'completed',
            model_used: 'gpt-3.5-turbo',
            tokens_used: 15,
            error_message: '',
        });

        const messages = await store.listMessages(session.id);
        expect(messages.map((message) => [message.role, message.content, message.status])).toEqual([
            ['user', 'Hello', 'completed'],
            ['assistant', 'Hi there!', 'completed'],
        ]);
        expect(messages[0].trace_id).toBe(messages[1].trace_id);
        expect(messages[0].span_id).not.toBe(messages[1].span_id);

        expect(provider.calls).toEqual([{
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: 'Hello' },
            ],
            provider: 'hosted',
            model: 'gpt-3.5-turbo',
            maxTokens: 1000,
            temperature: 0.7,
        }]);

        const updated = await store.getSession(session.id);
        expect(updated?.title).toBe('Hello');
        expect(updated?.updated_at).toBe(assistant.timestamp);
    });

    it('使用本地 provider 时选择 local_model', async () => {
        const provider = new StubCompletionProvider({ success: true, content: 'local', model: 'mistral', tokensUsed: null });
        const orchestrator = new ChatOrchestrator(store, provider, new StubToolBridge());

        const local: UserPreferences = { ...preferences, preferred_ai_provider: 'local', local_model: 'mistral', max_tokens: 64, temperature: 0.1 };
        const assistant = await orchestrator.processMessage(session, 'hi', local);

        expect(provider.calls[0]).toMatchObject({ provider: 'local', model: 'mistral', maxTokens: 64, temperature: 0.1 });
        expect(assistant.tokens_used).toBeNull();
    });

    it('provider 返回失败时 assistant 消息为 error', async () => {
        const provider = new StubCompletionProvider({ success: false, error: 'provider not available' });
        const orchestrator = new ChatOrchestrator(store, provider, new StubToolBridge());

        const assistant = await orchestrator.processMessage(session, 'Hello', preferences);

        expect(assistant).toMatchObject({
            status: 'error',
            content: 'Error generating response: provider not available',
            error_message: 'provider not available',
        });
        // 失败时仍会设置标题
        expect((await store.getSession(session.id))?.title).toBe('Hello');
    });

    it('provider 抛异常时 assistant 消息为 error，不向上抛出', async () => {
        const provider = new StubCompletionProvider(new Error('kaboom'));
        const orchestrator = new ChatOrchestrator(store, provider, new StubToolBridge());

        const assistant = await orchestrator.processMessage(session, 'Hello', preferences);

        expect(assistant).toMatchObject({
            status: 'error',
            content: 'An error occurred while processing your message: kaboom',
            error_message: 'kaboom',
        });
    });

    it('读取历史失败时占位消息也会进入终态', async () => {
        vi.spyOn(store, 'listRecentMessages').mockRejectedValueOnce(new Error('db down'));
        const provider = new StubCompletionProvider();
        const orchestrator = new ChatOrchestrator(store, provider, new StubToolBridge());

        const assistant = await orchestrator.processMessage(session, 'Hello', preferences);

        expect(assistant.status).toBe('error');
        expect(assistant.content).toBe('An error occurred while processing your message: db down');
        expect(provider.calls).toHaveLength(0);
        const statuses = (await store.listMessages(session.id)).map((message) => message.status);
        expect(statuses).toEqual(['completed', 'error']);
    });

    it('空消息直接拒绝，不落库', async () => {
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), new StubToolBridge());

        await expect(orchestrator.processMessage(session, '   ', preferences)).rejects.toBeInstanceOf(ValidationError);
        expect(await store.listMessages(session.id)).toEqual([]);
    });

    it('标题只在首次设置，之后不覆盖', async () => {
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), new StubToolBridge());
        const longText = 'x'.repeat(60);

        await orchestrator.processMessage(session, longText, preferences);
        await orchestrator.processMessage(session, 'second message', preferences);

        expect((await store.getSession(session.id))?.title).toBe(`${'x'.repeat(50)}...`);
    });

    it('上下文只包含最近 20 条已完成消息', async () => {
        for (let i = 0; i < 25; i++) {
            await store.appendMessage({
                session_id: session.id,
                role: i % 2 === 0 ? 'user' : 'assistant',
                content: `seed ${i}`,
                status: 'completed',
            });
        }
        await store.appendMessage({ session_id: session.id, role: 'assistant', content: 'broken', status: 'error' });

        const provider = new StubCompletionProvider();
        const orchestrator = new ChatOrchestrator(store, provider, new StubToolBridge());
        await orchestrator.processMessage(session, 'latest', preferences);

        const context = provider.calls[0].messages;
        expect(context).toHaveLength(21);
        expect(context[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT });
        expect(context[1].content).toBe('seed 6');
        expect(context[20]).toEqual({ role: 'user', content: 'latest' });
        expect(context.some((turn) => turn.content === 'broken')).toBe(false);
    });

    it('historyLimit 可配置', async () => {
        await store.appendMessage({ session_id: session.id, role: 'user', content: 'old', status: 'completed' });
        const provider = new StubCompletionProvider();
        const orchestrator = new ChatOrchestrator(store, provider, new StubToolBridge(), { historyLimit: 1 });

        await orchestrator.processMessage(session, 'new', preferences);

        expect(provider.calls[0].messages).toEqual([
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: 'new' },
        ]);
    });

    it('processExchange 同时返回用户消息', async () => {
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), new StubToolBridge());
        const { userMessage, assistantMessage } = await orchestrator.processExchange(session, 'Hello', preferences);

        expect(userMessage).toMatchObject({ role: 'user', content: 'Hello', status: 'completed' });
        expect(assistantMessage).toMatchObject({ role: 'assistant', content: 'ok', status: 'completed' });
    });
});

describe('ChatOrchestrator.invokeTool', () => {
    let store: InMemoryConversationStore;
    let session: ChatSession;

    beforeEach(async () => {
        store = new InMemoryConversationStore(steppingClock());
        session = await store.createSession({ user_id: USER });
    });

    const systemMessage = () =>
        store.appendMessage({ session_id: session.id, role: 'system', content: 'tool', status: 'processing' });

    it('成功：记录一条 success 操作', async () => {
        const bridge = new StubToolBridge({ success: true, data: { value: 'bar' }, durationMs: 37 });
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);
        const message = await systemMessage();

        const operation = await orchestrator.invokeTool(message, 'kv_get', { key: 'foo' });

        expect(operation).toMatchObject({
            message_id: message.id,
            operation_type: 'kv_get',
            parameters: { key: 'foo' },
            response: { value: 'bar' },
            status: 'success',
            duration_ms: 37,
            error_details: '',
        });
        expect(bridge.calls).toEqual([{ sessionId: session.id, toolName: 'kv_get', args: { key: 'foo' } }]);
        expect(await store.listToolOperations(session.id)).toHaveLength(1);
    });

    it('会话设置了 mcp_session_id 时使用它', async () => {
        await store.updateSession(session.id, { mcp_session_id: 'mcp_external' });
        const bridge = new StubToolBridge();
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);

        await orchestrator.invokeTool(await systemMessage(), 'kv_scan', {});

        expect(bridge.calls[0].sessionId).toBe('mcp_external');
    });

    it('HTTP 失败记录为 error', async () => {
        const bridge = new StubToolBridge({ success: false, error: 'HTTP 500: boom', durationMs: 5, timedOut: false });
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);

        const operation = await orchestrator.invokeTool(await systemMessage(), 'kv_set', { key: 'k', value: 1 });

        expect(operation).toMatchObject({ status: 'error', response: {}, duration_ms: 5, error_details: 'HTTP 500: boom' });
    });

    it('超时记录为 timeout', async () => {
        const bridge = new StubToolBridge({ success: false, error: 'Request timed out after 30s', durationMs: 30000, timedOut: true });
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);

        const operation = await orchestrator.invokeTool(await systemMessage(), 'store_find', {});

        expect(operation).toMatchObject({ status: 'timeout', error_details: 'Request timed out after 30s', duration_ms: 30000 });
    });

    it('bridge 抛异常时仍写入终态', async () => {
        const bridge = new StubToolBridge(new Error('unexpected'));
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);

        const operation = await orchestrator.invokeTool(await systemMessage(), 'kv_del', {});

        expect(operation).toMatchObject({ status: 'error', response: {}, duration_ms: null, error_details: 'unexpected' });
        expect(await store.listToolOperations(session.id)).toHaveLength(1);
    });

    it('每次调用恰好落库一行，无论成败', async () => {
        const bridge = new StubToolBridge(
            { success: true, data: { value: 1 }, durationMs: 2 },
            { success: false, error: 'HTTP 400: unsupported tool', durationMs: 3, timedOut: false },
            new Error('bridge crashed')
        );
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);
        const message = await systemMessage();

        await orchestrator.invokeTool(message, 'kv_get', { key: 'a' });
        await orchestrator.invokeTool(message, 'kv_ttl', { key: 'a' });
        await orchestrator.invokeTool(message, 'kv_mget', { keys: ['a'] });

        const operations = await store.listToolOperations(session.id);
        expect(operations.map((op) => [op.operation_type, op.status])).toEqual([
            ['kv_mget', 'error'],
            ['kv_ttl', 'error'],
            ['kv_get', 'success'],
        ]);
        expect(operations.some((op) => op.status === 'pending')).toBe(false);
    });
});

describe('ChatOrchestrator.runSessionToolCall', () => {
    let store: InMemoryConversationStore;
    let session: ChatSession;

    beforeEach(async () => {
        store = new InMemoryConversationStore(steppingClock());
        session = await store.createSession({ user_id: USER });
    });

    it('成功：system 消息标记为 completed', async () => {
        const bridge = new StubToolBridge({ success: true, data: { ok: true }, durationMs: 3 });
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);

        const { message, operation } = await orchestrator.runSessionToolCall(session, 'kv_get', { key: 'a' });

        expect(message).toMatchObject({ role: 'system', content: 'MCP tool call: kv_get - success', status: 'completed', error_message: '' });
        expect(operation.message_id).toBe(message.id);
        expect(operation.status).toBe('success');
    });

    it('失败：system 消息标记为 error 并带错误信息', async () => {
        const bridge = new StubToolBridge({ success: false, error: 'HTTP 404: no such key', durationMs: 2, timedOut: false });
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), bridge);

        const { message, operation } = await orchestrator.runSessionToolCall(session, 'kv_get', { key: 'a' });

        expect(message).toMatchObject({ content: 'MCP tool call: kv_get - error', status: 'error', error_message: 'HTTP 404: no such key' });
        expect(operation.status).toBe('error');
        const operations = await store.listToolOperations(session.id);
        expect(operations.map((op) => op.id)).toEqual([operation.id]);
    });

    it('未知工具在写入任何消息之前拒绝', async () => {
        const orchestrator = new ChatOrchestrator(store, new StubCompletionProvider(), new StubToolBridge());

        await expect(orchestrator.runSessionToolCall(session, 'rm_rf', {})).rejects.toBeInstanceOf(ValidationError);
        expect(await store.listMessages(session.id)).toEqual([]);
    });
});
