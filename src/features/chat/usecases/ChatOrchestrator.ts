import type { ConversationStore } from '../../../core/ports/ConversationStore.js';
import { buildSessionTitle, resolveMcpSessionId, type ChatSession, type ChatSessionPatch } from '../domain/ChatSession.js';
import type { ChatMessage, ChatMessagePatch } from '../domain/ChatMessage.js';
import { buildConversationContext, HISTORY_LIMIT } from '../domain/ConversationContext.js';
import { isToolOperationType, type ToolOperation, type ToolOperationResult, type ToolOperationType } from '../domain/ToolOperation.js';
import { resolveModelForProvider, type UserPreferences } from '../../preferences/domain/UserPreferences.js';
import type { ICompletionProvider } from '../ports/ICompletionProvider.js';
import type { IToolBridge } from '../ports/IToolBridge.js';
import { NotFoundError, ValidationError, toErrorMessage } from '../../../platform/errors.js';
import { logger } from '../../../platform/logger.js';
import { generateSpanId, generateTraceId, getTraceId } from '../../../platform/tracing.js';

const COMPONENT = 'ChatOrchestrator';

export interface ChatExchange {
    userMessage: ChatMessage;
    assistantMessage: ChatMessage;
}

export interface SessionToolCall {
    message: ChatMessage;
    operation: ToolOperation;
}

export interface ChatOrchestratorOptions {
    historyLimit?: number;
}

/**
 * Layer 2 Usecase: 消息处理与工具调用编排
 * 职责：
 * 1. 用户消息落库 → 占位 assistant 消息 → 组装上下文 → 调用模型 → 回写结果
 * 2. 更新会话 updated_at / 标题
 * 3. 调用 MCP 工具并记录 ToolOperation
 *
 * 规约：assistant 占位消息与 ToolOperation 最终一定处于终态，不会停留在 processing / pending
 */
export class ChatOrchestrator {
    private readonly historyLimit: number;

    constructor(
        private readonly store: ConversationStore,
        private readonly completionProvider: ICompletionProvider,
        private readonly toolBridge: IToolBridge,
        options: ChatOrchestratorOptions = {}
    ) {
        this.historyLimit = options.historyLimit ?? HISTORY_LIMIT;
    }

    /**
     * 处理用户消息的主入口
     * @returns 已处于终态 (completed / error) 的 assistant 消息
     */
    async processMessage(session: ChatSession, userText: string, preferences: UserPreferences): Promise<ChatMessage> {
        const { assistantMessage } = await this.processExchange(session, userText, preferences);
        return assistantMessage;
    }

    /**
     * 同 processMessage，同时返回本轮落库的用户消息
     */
    async processExchange(session: ChatSession, userText: string, preferences: UserPreferences): Promise<ChatExchange> {
        const text = userText.trim();
        if (!text) {
            throw new ValidationError('Message cannot be empty');
        }

        const traceId = getTraceId() ?? generateTraceId();

        // 1. 用户消息 (直接 completed)
        const userMessage = await this.store.appendMessage({
            session_id: session.id,
            role: 'user',
            content: text,
            status: 'completed',
            trace_id: traceId,
            span_id: generateSpanId(),
        });

        // 2. assistant 占位消息
        const placeholder = await this.store.appendMessage({
            session_id: session.id,
            role: 'assistant',
            content: '',
            status: 'processing',
            trace_id: traceId,
            span_id: generateSpanId(),
        });

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'Processing chat message',
            meta: { sessionId: session.id, provider: preferences.preferred_ai_provider, inputLength: text.length },
        });

        try {
            // 3. 上下文：最近 N 条已完成消息 (倒序取出，再恢复正序)
            const recent = await this.store.listRecentMessages(session.id, 'completed', this.historyLimit);
            const context = buildConversationContext(recent, this.historyLimit);

            // 4. 调用模型
            const result = await this.completionProvider.generate(
                context,
                preferences.preferred_ai_provider,
                resolveModelForProvider(preferences),
                preferences.max_tokens,
                preferences.temperature
            );

            // 5. 回写结果
            const patch: ChatMessagePatch = result.success
                ? {
                    content: result.content,
                    model_used: result.model,
                    tokens_used: result.tokensUsed,
                    status: 'completed',
                }
                : {
                    content: `Error generating response: ${result.error}`,
                    error_message: result.error,
                    status: 'error',
                };

            // 6. 落库
            const assistantMessage = await this.store.updateMessage(placeholder.id, patch);

            // 7. 会话元数据
            await this.touchSession(session.id, assistantMessage.timestamp, text);

            logger.info({
                kind: 'biz',
                component: COMPONENT,
                message: 'Chat message processed',
                meta: { sessionId: session.id, status: assistantMessage.status, tokensUsed: assistantMessage.tokens_used },
            });

            return { userMessage, assistantMessage };
        } catch (error) {
            logger.error({ kind: 'biz', component: COMPONENT, message: 'Error processing message', error, meta: { sessionId: session.id } });

            const reason = toErrorMessage(error) || 'Unknown error';
            const assistantMessage = await this.store.updateMessage(placeholder.id, {
                content: `An error occurred while processing your message: ${reason}`,
                error_message: reason,
                status: 'error',
            });
            return { userMessage, assistantMessage };
        }
    }

    /**
     * 调用 MCP 工具并记录一条 ToolOperation
     * 行先以 pending 落库，再前进到终态；每次调用恰好一行
     * 工具名在入口 (runSessionToolCall) 校验，这里不再拒绝
     */
    async invokeTool(message: ChatMessage, toolName: ToolOperationType, args: Record<string, unknown>): Promise<ToolOperation> {
        const operation = await this.store.createToolOperation({
            message_id: message.id,
            operation_type: toolName,
            parameters: { ...args },
        });

        let result: ToolOperationResult;
        try {
            const session = await this.store.getSession(message.session_id);
            if (!session) {
                throw new NotFoundError(`Session not found: ${message.session_id}`);
            }

            const callResult = await this.toolBridge.callTool(resolveMcpSessionId(session), toolName, args);

            result = callResult.success
                ? {
                    status: 'success',
                    response: callResult.data,
                    duration_ms: callResult.durationMs,
                    error_details: '',
                }
                : {
                    status: callResult.timedOut ? 'timeout' : 'error',
                    response: {},
                    duration_ms: callResult.durationMs,
                    error_details: callResult.error || 'Unknown error',
                };
        } catch (error) {
            logger.error({ kind: 'biz', component: COMPONENT, message: `Error calling MCP tool ${toolName}`, error, meta: { operationId: operation.id } });
            result = {
                status: 'error',
                response: {},
                duration_ms: null,
                error_details: toErrorMessage(error) || 'Unknown error',
            };
        }

        return this.store.finalizeToolOperation(operation.id, result);
    }

    /**
     * 直接调用工具：先写一条 system 消息承载此次操作，结束后按结果更新该消息
     */
    async runSessionToolCall(session: ChatSession, toolName: string, args: Record<string, unknown>): Promise<SessionToolCall> {
        if (!isToolOperationType(toolName)) {
            throw new ValidationError(`Unknown tool: ${toolName}`);
        }

        const systemMessage = await this.store.appendMessage({
            session_id: session.id,
            role: 'system',
            content: `MCP tool call: ${toolName}`,
            status: 'processing',
            trace_id: getTraceId() ?? generateTraceId(),
            span_id: generateSpanId(),
        });

        let operation: ToolOperation;
        try {
            operation = await this.invokeTool(systemMessage, toolName, args);
        } catch (error) {
            await this.store.updateMessage(systemMessage.id, {
                content: `MCP tool call: ${toolName} - error`,
                status: 'error',
                error_message: toErrorMessage(error) || 'Unknown error',
            });
            throw error;
        }

        const message = await this.store.updateMessage(systemMessage.id, {
            content: `MCP tool call: ${toolName} - ${operation.status}`,
            status: operation.status === 'success' ? 'completed' : 'error',
            error_message: operation.error_details,
        });

        logger.info({
            kind: 'biz',
            component: COMPONENT,
            message: 'MCP tool call recorded',
            meta: { sessionId: session.id, toolName, status: operation.status, durationMs: operation.duration_ms },
        });

        return { message, operation };
    }

    /**
     * 更新 updated_at；标题一旦设置不再覆盖 (以存储中的最新值为准)
     */
    private async touchSession(sessionId: string, updatedAt: string, userText: string): Promise<void> {
        const current = await this.store.getSession(sessionId);
        if (!current) {
            throw new NotFoundError(`Session not found: ${sessionId}`);
        }

        const patch: ChatSessionPatch = { updated_at: updatedAt };
        if (!current.title) {
            patch.title = buildSessionTitle(userText);
        }
        await this.store.updateSession(sessionId, patch);
    }
}
