import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/tests/**/*.test.ts'],
        environment: 'node',
        // 测试环境不写日志文件，避免残留句柄
        env: {
            LOG_TO_FILE: 'false',
            LOG_LEVEL: 'error',
        },
    },
});
