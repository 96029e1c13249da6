import type { ConversationStore } from '../../../core/ports/ConversationStore.js';
import { bizLog } from '../../../platform/logger.js';
import {
    createDefaultPreferences,
    mergePreferences,
    parsePreferencesPatch,
    type UserPreferences,
} from '../domain/UserPreferences.js';

const COMPONENT = 'PreferencesService';

/**
 * Layer 2 Usecase: 用户偏好
 * - getOrCreate: 幂等 upsert，不存在时按默认值创建
 * - update: 只合并请求中出现的字段
 */
export class PreferencesService {
    constructor(
        private readonly store: ConversationStore,
        private readonly now: () => Date = () => new Date()
    ) {}

    async getOrCreate(userId: string): Promise<UserPreferences> {
        const existing = await this.store.getPreferences(userId);
        if (existing) return existing;

        const created = await this.store.ensurePreferences(createDefaultPreferences(userId, this.now().toISOString()));
        bizLog(COMPONENT, 'Preferences initialized with defaults', { userId });
        return created;
    }

    /**
     * @param input 原始请求体；非法字段抛 ValidationError，且不会落库
     */
    async update(userId: string, input: unknown): Promise<UserPreferences> {
        const patch = parsePreferencesPatch(input);
        const current = await this.getOrCreate(userId);
        const saved = await this.store.savePreferences(mergePreferences(current, patch, this.now().toISOString()));

        bizLog(COMPONENT, 'Preferences updated', { userId, fields: Object.keys(patch) });
        return saved;
    }
}
