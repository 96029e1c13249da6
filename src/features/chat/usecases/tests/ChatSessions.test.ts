import { describe, it, expect, beforeEach } from 'vitest';
import { ChatSessions } from '../ChatSessions.js';
import { InMemoryConversationStore } from '../../../../infrastructure/memory/InMemoryConversationStore.js';
import { NotFoundError } from '../../../../platform/errors.js';
import { steppingClock } from './stubs.js';

describe('ChatSessions', () => {
    let store: InMemoryConversationStore;
    let sessions: ChatSessions;

    beforeEach(() => {
        store = new InMemoryConversationStore(steppingClock('2024-05-06T07:08:00.000Z'));
        sessions = new ChatSessions(store);
    });

    it('列表展示标题：title > 首条用户消息 > 创建时间', async () => {
        const titled = await sessions.createSession('user_1');
        await store.updateSession(titled.id, { title: 'Shopping list' });

        const untitled = await sessions.createSession('user_1');
        await store.appendMessage({ session_id: untitled.id, role: 'user', content: 'remember my locker code', status: 'completed' });

        const empty = await sessions.createSession('user_1');

        const summaries = await sessions.listSessions('user_1');
        const titles = new Map(summaries.map((summary) => [summary.session.id, summary.display_title]));

        expect(titles.get(titled.id)).toBe('Shopping list');
        expect(titles.get(untitled.id)).toBe('remember my locker code');
        expect(titles.get(empty.id)).toBe('Chat 2024-05-06 07:08');
    });

    it('非本人会话视为不存在', async () => {
        const session = await sessions.createSession('owner');

        await expect(sessions.getSession('intruder', session.id)).rejects.toBeInstanceOf(NotFoundError);
        await expect(sessions.getHistory('intruder', session.id)).rejects.toThrow(`Session not found: ${session.id}`);
        await expect(sessions.deleteSession('intruder', session.id)).rejects.toBeInstanceOf(NotFoundError);
        expect((await store.getSession(session.id))?.is_active).toBe(true);
    });

    it('历史按时间正序返回', async () => {
        const session = await sessions.createSession('user_1');
        await store.appendMessage({ session_id: session.id, role: 'user', content: 'first', status: 'completed' });
        await store.appendMessage({ session_id: session.id, role: 'assistant', content: 'second', status: 'completed' });

        const history = await sessions.getHistory('user_1', session.id);

        expect(history.session_id).toBe(session.id);
        expect(history.title).toBe('first');
        expect(history.messages.map((message) => message.content)).toEqual(['first', 'second']);
    });

    it('软删除后不再出现在列表中', async () => {
        const kept = await sessions.createSession('user_1');
        const removed = await sessions.createSession('user_1');

        const result = await sessions.deleteSession('user_1', removed.id);

        expect(result.is_active).toBe(false);
        const listed = await sessions.listSessions('user_1');
        expect(listed.map((summary) => summary.session.id)).toEqual([kept.id]);
        // 数据保留
        expect(await store.getSession(removed.id)).not.toBeNull();
    });

    it('列出会话下的工具调用', async () => {
        const session = await sessions.createSession('user_1');
        const message = await store.appendMessage({ session_id: session.id, role: 'system', content: 'tool', status: 'processing' });
        const operation = await store.createToolOperation({ message_id: message.id, operation_type: 'kv_ttl', parameters: { key: 'k' } });

        const result = await sessions.listOperations('user_1', session.id);

        expect(result.session_id).toBe(session.id);
        expect(result.operations.map((op) => op.id)).toEqual([operation.id]);
    });
});
