import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import config from '../../platform/config.js';
import { logger } from '../../platform/logger.js';

const COMPONENT = 'SupabaseClient';

class SupabaseService {
    private static instance: SupabaseService;
    public client: SupabaseClient | null = null;

    private constructor() {
        if (config.supabase.url && config.supabase.key) {
            try {
                this.client = createClient(config.supabase.url, config.supabase.key, {
                    // 服务端使用，不需要持久化 auth 会话
                    auth: { persistSession: false, autoRefreshToken: false },
                });
                logger.info({ kind: 'sys', component: COMPONENT, message: 'Supabase client initialized' });
            } catch (error) {
                logger.error({ kind: 'sys', component: COMPONENT, message: 'Failed to initialize Supabase client', error });
            }
        } else {
            logger.warn({ kind: 'sys', component: COMPONENT, message: 'Supabase credentials missing' });
        }
    }

    public static getInstance(): SupabaseService {
        if (!SupabaseService.instance) {
            SupabaseService.instance = new SupabaseService();
        }
        return SupabaseService.instance;
    }
}

/**
 * 懒加载：只有真正需要 Supabase 时才初始化 (测试不会触发)
 */
export function getSupabaseClient(): SupabaseClient | null {
    return SupabaseService.getInstance().client;
}
