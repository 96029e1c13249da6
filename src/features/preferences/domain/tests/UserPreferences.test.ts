import { describe, it, expect } from 'vitest';
import {
    createDefaultPreferences,
    mergePreferences,
    parsePreferencesPatch,
    resolveModelForProvider,
} from '../UserPreferences.js';
import { ValidationError } from '../../../../platform/errors.js';

const CREATED_AT = '2024-01-01T00:00:00.000Z';

describe('createDefaultPreferences', () => {
    it('默认值', () => {
        expect(createDefaultPreferences('user_1', CREATED_AT)).toEqual({
            user_id: 'user_1',
            preferred_ai_provider: 'hosted',
            hosted_model: 'gpt-3.5-turbo',
            local_model: 'llama2',
            max_tokens: 1000,
            temperature: 0.7,
            theme: 'light',
            show_timestamps: true,
            show_token_usage: false,
            show_mcp_operations: false,
            created_at: CREATED_AT,
            updated_at: CREATED_AT,
        });
    });

    it('每次返回新对象', () => {
        expect(createDefaultPreferences('u', CREATED_AT)).not.toBe(createDefaultPreferences('u', CREATED_AT));
    });
});

describe('resolveModelForProvider', () => {
    it('按 provider 选择模型', () => {
        const defaults = createDefaultPreferences('user_1', CREATED_AT);
        expect(resolveModelForProvider(defaults)).toBe('gpt-3.5-turbo');
        expect(resolveModelForProvider({ ...defaults, preferred_ai_provider: 'local' })).toBe('llama2');
    });
});

describe('parsePreferencesPatch', () => {
    it('只保留出现的已知字段，并 trim 模型名', () => {
        const patch = parsePreferencesPatch({
            preferred_ai_provider: 'local',
            local_model: '  mistral ',
            temperature: 0,
            show_token_usage: true,
            unknown_field: 'ignored',
        });
        expect(patch).toEqual({
            preferred_ai_provider: 'local',
            local_model: 'mistral',
            temperature: 0,
            show_token_usage: true,
        });
    });

    it('空对象得到空 patch', () => {
        expect(parsePreferencesPatch({})).toEqual({});
    });

    it.each([
        [null, 'Preferences payload must be an object'],
        [['hosted'], 'Preferences payload must be an object'],
        [{ preferred_ai_provider: 'anthropic' }, 'preferred_ai_provider must be one of: hosted, local'],
        [{ hosted_model: '' }, 'hosted_model must be a non-empty string of at most 50 characters'],
        [{ local_model: 'x'.repeat(51) }, 'local_model must be a non-empty string of at most 50 characters'],
        [{ max_tokens: 0 }, 'max_tokens must be a positive integer'],
        [{ max_tokens: 10.5 }, 'max_tokens must be a positive integer'],
        [{ temperature: 2.5 }, 'temperature must be a number between 0 and 2'],
        [{ temperature: '0.5' }, 'temperature must be a number between 0 and 2'],
        [{ theme: 'x'.repeat(21) }, 'theme must be a non-empty string of at most 20 characters'],
        [{ show_timestamps: 'yes' }, 'show_timestamps must be a boolean'],
    ])('拒绝非法输入 %j', (input, message) => {
        expect(() => parsePreferencesPatch(input)).toThrow(ValidationError);
        expect(() => parsePreferencesPatch(input)).toThrow(message);
    });
});

describe('mergePreferences', () => {
    it('合并 patch，保留 user_id / created_at，刷新 updated_at', () => {
        const current = createDefaultPreferences('user_1', CREATED_AT);
        const merged = mergePreferences(current, { max_tokens: 256, theme: 'dark' }, '2024-02-01T00:00:00.000Z');
        expect(merged).toEqual({
            ...current,
            max_tokens: 256,
            theme: 'dark',
            updated_at: '2024-02-01T00:00:00.000Z',
        });
    });
});
