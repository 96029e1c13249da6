/**
 * 应用错误类型
 * HTTP Adapter 根据 statusCode 决定响应码，其余异常一律按 500 处理
 */

export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;

    constructor(message: string, code: string = 'UNKNOWN_ERROR', statusCode: number = 500) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.statusCode = statusCode;
    }
}

/**
 * 输入校验失败，在任何落库之前抛出
 */
export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR', 400);
        this.name = 'ValidationError';
    }
}

export class UnauthorizedError extends AppError {
    constructor(message: string = 'Missing user identity') {
        super(message, 'UNAUTHORIZED', 401);
        this.name = 'UnauthorizedError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string = 'Not found') {
        super(message, 'NOT_FOUND', 404);
        this.name = 'NotFoundError';
    }
}

export class PayloadTooLargeError extends AppError {
    constructor(message: string = 'Request body too large') {
        super(message, 'PAYLOAD_TOO_LARGE', 413);
        this.name = 'PayloadTooLargeError';
    }
}

/**
 * 存储层读写失败
 */
export class StoreError extends AppError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'STORE_ERROR', 500);
        this.name = 'StoreError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

export function toErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
