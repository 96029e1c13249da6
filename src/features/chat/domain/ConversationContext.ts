/**
 * Layer A: Domain Rules - 上下文组装
 * 固定 system 提示 + 最近 N 条已完成消息 (时间正序)
 */

import type { ChatMessage } from './ChatMessage.js';
import type { ChatTurn } from '../ports/ICompletionProvider.js';

export const HISTORY_LIMIT = 20;

export const SYSTEM_PROMPT =
    'You are a helpful AI assistant with access to a chat datastore via MCP tools. ' +
    'You can store and retrieve information using KV operations and query document collections.';

/**
 * @param recentNewestFirst 按时间倒序取出的最近消息
 */
export function buildConversationContext(recentNewestFirst: ChatMessage[], limit: number = HISTORY_LIMIT): ChatTurn[] {
    const chronological = recentNewestFirst.slice(0, limit).reverse();
    return [
        { role: 'system', content: SYSTEM_PROMPT },
        ...chronological.map((message) => ({ role: message.role, content: message.content })),
    ];
}
