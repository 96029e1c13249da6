import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from .env file
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
    http: {
        host: string;
        port: number;
    };
    mcp: {
        baseUrl: string;
        callTimeoutMs: number;
        capabilitiesTimeoutMs: number;
    };
    openai: {
        apiKey: string;
        baseUrl: string;
        timeoutMs: number;
    };
    ollama: {
        baseUrl: string;
        timeoutMs: number;
    };
    supabase: {
        url: string;
        key: string;
    };
    /** 出站代理 (AI / MCP 请求)，为空则直连 */
    outboundProxyUrl: string | null;
    logging: {
        level: LogLevel;
        dir: string;
        toFile: boolean;
    };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(raw: string | undefined): LogLevel {
    const normalized = raw?.toLowerCase().trim();
    return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

function parseNumber(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

const stripTrailingSlash = (url: string) => url.replace(/\/+$/, '');

const config: Config = {
    http: {
        host: process.env.HTTP_HOST || '0.0.0.0',
        port: parseNumber(process.env.HTTP_PORT, 8080),
    },
    mcp: {
        baseUrl: stripTrailingSlash(process.env.MCP_SERVER_URL || 'http://localhost:8081'),
        callTimeoutMs: parseNumber(process.env.MCP_CALL_TIMEOUT_MS, 30_000),
        capabilitiesTimeoutMs: parseNumber(process.env.MCP_CAPABILITIES_TIMEOUT_MS, 10_000),
    },
    openai: {
        apiKey: process.env.OPENAI_API_KEY || '',
        baseUrl: stripTrailingSlash(process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1'),
        timeoutMs: parseNumber(process.env.OPENAI_TIMEOUT_MS, 60_000),
    },
    ollama: {
        baseUrl: stripTrailingSlash(process.env.OLLAMA_BASE_URL || 'http://localhost:11434'),
        timeoutMs: parseNumber(process.env.OLLAMA_TIMEOUT_MS, 60_000),
    },
    supabase: {
        url: process.env.SUPABASE_URL || '',
        key: process.env.SUPABASE_KEY || '',
    },
    outboundProxyUrl: process.env.OUTBOUND_PROXY_URL || null,
    logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
        dir: process.env.LOG_DIR || path.resolve(process.cwd(), 'logs'),
        toFile: process.env.LOG_TO_FILE !== 'false',
    },
};

export default config;
