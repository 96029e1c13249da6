/**
 * Layer A: Domain - 用户偏好
 * 每个用户一行，首次访问时按默认值创建；更新只合并请求中出现的字段
 */

import { ValidationError } from '../../../platform/errors.js';

/** 闭合的两种 Provider：托管 API / 本地模型服务 */
export type AIProvider = 'hosted' | 'local';

export const AI_PROVIDERS: readonly AIProvider[] = ['hosted', 'local'];

export interface UserPreferences {
    user_id: string;
    preferred_ai_provider: AIProvider;
    hosted_model: string;
    local_model: string;
    max_tokens: number;
    temperature: number;

    // UI 偏好
    theme: string;
    show_timestamps: boolean;
    show_token_usage: boolean;
    show_mcp_operations: boolean;

    created_at: string;
    updated_at: string;
}

export type UserPreferencesPatch = Partial<Omit<UserPreferences, 'user_id' | 'created_at' | 'updated_at'>>;

const MODEL_NAME_MAX_LENGTH = 50;
const THEME_MAX_LENGTH = 20;

/**
 * 规则：构造默认偏好 (每次返回新对象，不共享可变默认值)
 */
export function createDefaultPreferences(userId: string, now: string = new Date().toISOString()): UserPreferences {
    return {
        user_id: userId,
        preferred_ai_provider: 'hosted',
        hosted_model: 'gpt-3.5-turbo',
        local_model: 'llama2',
        max_tokens: 1000,
        temperature: 0.7,
        theme: 'light',
        show_timestamps: true,
        show_token_usage: false,
        show_mcp_operations: false,
        created_at: now,
        updated_at: now,
    };
}

/**
 * 规则：根据 Provider 选择模型
 */
export function resolveModelForProvider(preferences: UserPreferences): string {
    switch (preferences.preferred_ai_provider) {
        case 'hosted':
            return preferences.hosted_model;
        case 'local':
            return preferences.local_model;
    }
}

export function mergePreferences(
    current: UserPreferences,
    patch: UserPreferencesPatch,
    now: string = new Date().toISOString()
): UserPreferences {
    return { ...current, ...patch, user_id: current.user_id, created_at: current.created_at, updated_at: now };
}

// ============ 请求解析 ============

const isRecord = (value: unknown): value is Record<string, unknown> =>
    Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const isProvider = (value: unknown): value is AIProvider =>
    typeof value === 'string' && AI_PROVIDERS.some((provider) => provider === value);

const requireBoolean = (field: string, value: unknown): boolean => {
    if (typeof value !== 'boolean') {
        throw new ValidationError(`${field} must be a boolean`);
    }
    return value;
};

const requireShortString = (field: string, value: unknown, maxLength: number): string => {
    if (typeof value !== 'string' || value.trim().length === 0 || value.length > maxLength) {
        throw new ValidationError(`${field} must be a non-empty string of at most ${maxLength} characters`);
    }
    return value.trim();
};

/**
 * 解析偏好更新请求
 * 只保留出现的已知字段；未知字段忽略，非法值抛 ValidationError
 */
export function parsePreferencesPatch(input: unknown): UserPreferencesPatch {
    if (!isRecord(input)) {
        throw new ValidationError('Preferences payload must be an object');
    }

    const patch: UserPreferencesPatch = {};

    if ('preferred_ai_provider' in input) {
        const value = input.preferred_ai_provider;
        if (!isProvider(value)) {
            throw new ValidationError(`preferred_ai_provider must be one of: ${AI_PROVIDERS.join(', ')}`);
        }
        patch.preferred_ai_provider = value;
    }
    if ('hosted_model' in input) {
        patch.hosted_model = requireShortString('hosted_model', input.hosted_model, MODEL_NAME_MAX_LENGTH);
    }
    if ('local_model' in input) {
        patch.local_model = requireShortString('local_model', input.local_model, MODEL_NAME_MAX_LENGTH);
    }
    if ('max_tokens' in input) {
        const value = input.max_tokens;
        if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
            throw new ValidationError('max_tokens must be a positive integer');
        }
        patch.max_tokens = value;
    }
    if ('temperature' in input) {
        const value = input.temperature;
        if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 2) {
            throw new ValidationError('temperature must be a number between 0 and 2');
        }
        patch.temperature = value;
    }
    if ('theme' in input) {
        patch.theme = requireShortString('theme', input.theme, THEME_MAX_LENGTH);
    }
    if ('show_timestamps' in input) {
        patch.show_timestamps = requireBoolean('show_timestamps', input.show_timestamps);
    }
    if ('show_token_usage' in input) {
        patch.show_token_usage = requireBoolean('show_token_usage', input.show_token_usage);
    }
    if ('show_mcp_operations' in input) {
        patch.show_mcp_operations = requireBoolean('show_mcp_operations', input.show_mcp_operations);
    }

    return patch;
}
