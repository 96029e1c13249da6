import type { ChatOrchestrator } from '../chat/usecases/ChatOrchestrator.js';
import type { ChatSessions } from '../chat/usecases/ChatSessions.js';
import type { PreferencesService } from '../preferences/usecases/PreferencesService.js';
import type { IToolBridge } from '../chat/ports/IToolBridge.js';
import type { ChatMessage } from '../chat/domain/ChatMessage.js';
import { AppError, UnauthorizedError, ValidationError, toErrorMessage } from '../../platform/errors.js';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'ApiRouter';

export type HttpMethod = 'GET' | 'POST';

export interface ApiRequest {
    method: string;
    path: string;
    /** X-User-Id；认证不在本服务范围内 */
    userId: string | undefined;
    body: unknown;
}

export interface ApiResponse {
    status: number;
    body: unknown;
}

export interface ApiDependencies {
    orchestrator: ChatOrchestrator;
    sessions: ChatSessions;
    preferences: PreferencesService;
    toolBridge: IToolBridge;
}

interface RouteContext {
    userId: string;
    params: string[];
    body: unknown;
}

interface Route {
    method: HttpMethod;
    pattern: RegExp;
    requiresUser: boolean;
    handler: (ctx: RouteContext) => Promise<ApiResponse>;
}

const ok = (body: unknown): ApiResponse => ({ status: 200, body });

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

/**
 * 第一个路径参数
 */
function sessionIdParam(ctx: RouteContext): string {
    const [sessionId] = ctx.params;
    if (!sessionId) {
        throw new ValidationError('Missing session id');
    }
    try {
        return decodeURIComponent(sessionId);
    } catch {
        throw new ValidationError('Malformed session id');
    }
}

function messageSummary(message: ChatMessage) {
    return {
        id: message.id,
        content: message.content,
        timestamp: message.timestamp,
    };
}

/**
 * HTTP Adapter (Layer 1 Interface) - JSON API 路由
 * 与传输层解耦：输入输出都是普通对象，便于测试
 */
export class ApiRouter {
    private readonly routes: Route[];

    constructor(private readonly deps: ApiDependencies) {
        this.routes = [
            { method: 'GET', pattern: /^\/health\/?$/, requiresUser: false, handler: async () => ok({ status: 'ok' }) },

            { method: 'GET', pattern: /^\/api\/sessions\/?$/, requiresUser: true, handler: (ctx) => this.listSessions(ctx) },
            { method: 'POST', pattern: /^\/api\/sessions\/?$/, requiresUser: true, handler: (ctx) => this.createSession(ctx) },
            { method: 'GET', pattern: /^\/api\/sessions\/([^/]+)\/?$/, requiresUser: true, handler: (ctx) => this.getSession(ctx) },
            { method: 'POST', pattern: /^\/api\/sessions\/([^/]+)\/send\/?$/, requiresUser: true, handler: (ctx) => this.sendMessage(ctx) },
            { method: 'GET', pattern: /^\/api\/sessions\/([^/]+)\/history\/?$/, requiresUser: true, handler: (ctx) => this.sessionHistory(ctx) },
            { method: 'GET', pattern: /^\/api\/sessions\/([^/]+)\/operations\/?$/, requiresUser: true, handler: (ctx) => this.sessionOperations(ctx) },
            { method: 'POST', pattern: /^\/api\/sessions\/([^/]+)\/mcp-tool\/?$/, requiresUser: true, handler: (ctx) => this.callTool(ctx) },
            { method: 'POST', pattern: /^\/api\/sessions\/([^/]+)\/delete\/?$/, requiresUser: true, handler: (ctx) => this.deleteSession(ctx) },

            { method: 'GET', pattern: /^\/api\/preferences\/?$/, requiresUser: true, handler: (ctx) => this.getPreferences(ctx) },
            { method: 'POST', pattern: /^\/api\/preferences\/?$/, requiresUser: true, handler: (ctx) => this.updatePreferences(ctx) },
            { method: 'GET', pattern: /^\/api\/mcp\/capabilities\/?$/, requiresUser: true, handler: () => this.capabilities() },
        ];
    }

    async handle(request: ApiRequest): Promise<ApiResponse> {
        const matched = this.match(request.method, request.path);
        if (matched === 'method_not_allowed') {
            return { status: 405, body: { error: 'Method not allowed' } };
        }
        if (!matched) {
            return { status: 404, body: { error: 'Not found' } };
        }

        const { route, params } = matched;
        try {
            const userId = request.userId?.trim() ?? '';
            if (route.requiresUser && !userId) {
                throw new UnauthorizedError();
            }
            return await route.handler({ userId, params, body: request.body });
        } catch (error) {
            if (error instanceof AppError && error.statusCode < 500) {
                logger.warn({ kind: 'sys', component: COMPONENT, message: `${request.method} ${request.path} rejected: ${error.message}`, meta: { status: error.statusCode } });
                return { status: error.statusCode, body: { error: error.message } };
            }
            logger.error({ kind: 'sys', component: COMPONENT, message: `${request.method} ${request.path} failed`, error });
            return { status: 500, body: { error: toErrorMessage(error) } };
        }
    }

    private match(method: string, path: string): { route: Route; params: string[] } | 'method_not_allowed' | null {
        let pathMatched = false;
        for (const route of this.routes) {
            const result = route.pattern.exec(path);
            if (!result) continue;
            pathMatched = true;
            if (route.method === method) {
                return { route, params: result.slice(1) };
            }
        }
        return pathMatched ? 'method_not_allowed' : null;
    }

    // ============ Sessions ============

    private async listSessions(ctx: RouteContext): Promise<ApiResponse> {
        const summaries = await this.deps.sessions.listSessions(ctx.userId);
        return ok({
            sessions: summaries.map(({ session, display_title }) => ({ ...session, display_title })),
        });
    }

    private async createSession(ctx: RouteContext): Promise<ApiResponse> {
        const session = await this.deps.sessions.createSession(ctx.userId);
        return { status: 201, body: { session } };
    }

    private async getSession(ctx: RouteContext): Promise<ApiResponse> {
        const history = await this.deps.sessions.getHistory(ctx.userId, sessionIdParam(ctx));
        const session = await this.deps.sessions.getSession(ctx.userId, history.session_id);
        const preferences = await this.deps.preferences.getOrCreate(ctx.userId);
        return ok({ session, title: history.title, messages: history.messages, preferences });
    }

    private async sendMessage(ctx: RouteContext): Promise<ApiResponse> {
        const session = await this.deps.sessions.getSession(ctx.userId, sessionIdParam(ctx));

        const raw = isRecord(ctx.body) ? ctx.body.message : undefined;
        const text = typeof raw === 'string' ? raw.trim() : '';
        if (!text) {
            throw new ValidationError('Message cannot be empty');
        }

        const preferences = await this.deps.preferences.getOrCreate(ctx.userId);
        const { userMessage, assistantMessage } = await this.deps.orchestrator.processExchange(session, text, preferences);

        return ok({
            success: true,
            user_message: messageSummary(userMessage),
            assistant_message: {
                ...messageSummary(assistantMessage),
                status: assistantMessage.status,
                model_used: assistantMessage.model_used,
                tokens_used: assistantMessage.tokens_used,
            },
        });
    }

    private async sessionHistory(ctx: RouteContext): Promise<ApiResponse> {
        return ok(await this.deps.sessions.getHistory(ctx.userId, sessionIdParam(ctx)));
    }

    private async sessionOperations(ctx: RouteContext): Promise<ApiResponse> {
        return ok(await this.deps.sessions.listOperations(ctx.userId, sessionIdParam(ctx)));
    }

    private async callTool(ctx: RouteContext): Promise<ApiResponse> {
        const session = await this.deps.sessions.getSession(ctx.userId, sessionIdParam(ctx));

        const body = isRecord(ctx.body) ? ctx.body : {};
        const toolName = body.tool_name;
        if (typeof toolName !== 'string' || toolName.trim() === '') {
            throw new ValidationError('Tool name is required');
        }
        const args = body.arguments ?? {};
        if (!isRecord(args)) {
            throw new ValidationError('arguments must be an object');
        }

        const { operation } = await this.deps.orchestrator.runSessionToolCall(session, toolName.trim(), args);
        return ok({
            success: operation.status === 'success',
            operation_id: operation.id,
            response: operation.response,
            duration_ms: operation.duration_ms,
            error: operation.error_details,
        });
    }

    private async deleteSession(ctx: RouteContext): Promise<ApiResponse> {
        await this.deps.sessions.deleteSession(ctx.userId, sessionIdParam(ctx));
        return ok({ success: true });
    }

    // ============ Preferences / capabilities ============

    private async getPreferences(ctx: RouteContext): Promise<ApiResponse> {
        return ok({ preferences: await this.deps.preferences.getOrCreate(ctx.userId) });
    }

    private async updatePreferences(ctx: RouteContext): Promise<ApiResponse> {
        const preferences = await this.deps.preferences.update(ctx.userId, ctx.body);
        return ok({ success: true, preferences });
    }

    private async capabilities(): Promise<ApiResponse> {
        return ok(await this.deps.toolBridge.getCapabilities());
    }
}
