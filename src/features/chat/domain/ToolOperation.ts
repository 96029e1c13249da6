/**
 * Layer A: Domain - MCP 工具调用审计记录
 */

export const TOOL_OPERATION_TYPES = [
    'kv_get',
    'kv_set',
    'kv_mget',
    'kv_del',
    'kv_ttl',
    'kv_scan',
    'store_find',
    'store_aggregate',
    'session_appendEvent',
    'capabilities_list',
] as const;

export type ToolOperationType = (typeof TOOL_OPERATION_TYPES)[number];

/**
 * pending 只在创建到回写之间存在，之后只能前进到终态
 */
export type ToolOperationStatus = 'pending' | 'success' | 'error' | 'timeout';

export type ToolOperationTerminalStatus = Exclude<ToolOperationStatus, 'pending'>;

export interface ToolOperation {
    id: string;
    message_id: string;
    operation_type: ToolOperationType;
    parameters: Record<string, unknown>;
    response: Record<string, unknown>;
    status: ToolOperationStatus;
    duration_ms: number | null;
    timestamp: string;
    error_details: string;
}

export interface NewToolOperation {
    message_id: string;
    operation_type: ToolOperationType;
    parameters: Record<string, unknown>;
}

export interface ToolOperationResult {
    status: ToolOperationTerminalStatus;
    response: Record<string, unknown>;
    duration_ms: number | null;
    error_details: string;
}

export function isToolOperationType(value: unknown): value is ToolOperationType {
    return typeof value === 'string' && TOOL_OPERATION_TYPES.some((type) => type === value);
}
