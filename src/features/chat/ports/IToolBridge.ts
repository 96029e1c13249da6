export type ToolCallResult =
    | {
        success: true;
        data: Record<string, unknown>;
        durationMs: number;
    }
    | {
        success: false;
        error: string;
        durationMs: number;
        /** 传输层超时 (区别于 HTTP 错误) */
        timedOut: boolean;
    };

/** 能力列表；失败时为 { error } */
export type McpCapabilities = Record<string, unknown>;

/**
 * Layer C: Port - MCP 工具服务
 * 不做重试，调用方按 at-most-once 处理
 */
export interface IToolBridge {
    callTool(sessionId: string, toolName: string, args: Record<string, unknown>): Promise<ToolCallResult>;
    getCapabilities(): Promise<McpCapabilities>;
}
