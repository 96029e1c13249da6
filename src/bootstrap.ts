import config from './platform/config.js';
import { logger } from './platform/logger.js';
import type { ConversationStore } from './core/ports/ConversationStore.js';
import { createHttpFetch } from './infrastructure/networking/HttpClient.js';
import { HostedCompletionBackend } from './infrastructure/ai/backends/HostedCompletionBackend.js';
import { LocalCompletionBackend } from './infrastructure/ai/backends/LocalCompletionBackend.js';
import { CompletionProvider } from './infrastructure/ai/CompletionProvider.js';
import { McpToolBridge } from './infrastructure/mcp/McpToolBridge.js';
import { getSupabaseClient } from './infrastructure/supabase/SupabaseClient.js';
import { SupabaseConversationStore } from './infrastructure/repositories/SupabaseConversationStore.js';
import { InMemoryConversationStore } from './infrastructure/memory/InMemoryConversationStore.js';
import { ChatOrchestrator } from './features/chat/usecases/ChatOrchestrator.js';
import { HISTORY_LIMIT } from './features/chat/domain/ConversationContext.js';
import { ChatSessions } from './features/chat/usecases/ChatSessions.js';
import { PreferencesService } from './features/preferences/usecases/PreferencesService.js';
import { ApiRouter } from './features/http_adapter/ApiRouter.js';

const COMPONENT = 'Bootstrap';

function createConversationStore(): ConversationStore {
    const client = getSupabaseClient();
    if (client) {
        logger.info({ kind: 'sys', component: COMPONENT, message: 'Using Supabase conversation store' });
        return new SupabaseConversationStore(client);
    }
    logger.warn({
        kind: 'sys',
        component: COMPONENT,
        message: 'SUPABASE_URL / SUPABASE_KEY not set, falling back to in-memory store (data is lost on exit)',
    });
    return new InMemoryConversationStore();
}

/**
 * 组装依赖：基础设施 → 用例 → 路由
 */
export function createApiRouter(): ApiRouter {
    const fetchImpl = createHttpFetch(config.outboundProxyUrl);

    const completionProvider = new CompletionProvider({
        hosted: new HostedCompletionBackend({
            apiKey: config.openai.apiKey,
            baseUrl: config.openai.baseUrl,
            timeoutMs: config.openai.timeoutMs,
            fetch: fetchImpl,
        }),
        local: new LocalCompletionBackend({
            baseUrl: config.ollama.baseUrl,
            timeoutMs: config.ollama.timeoutMs,
            fetch: fetchImpl,
        }),
    });

    const toolBridge = new McpToolBridge({
        baseUrl: config.mcp.baseUrl,
        callTimeoutMs: config.mcp.callTimeoutMs,
        capabilitiesTimeoutMs: config.mcp.capabilitiesTimeoutMs,
        fetch: fetchImpl,
    });

    const store = createConversationStore();

    return new ApiRouter({
        orchestrator: new ChatOrchestrator(store, completionProvider, toolBridge, { historyLimit: HISTORY_LIMIT }),
        sessions: new ChatSessions(store),
        preferences: new PreferencesService(store),
        toolBridge,
    });
}
