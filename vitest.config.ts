import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['mcp-servers/**/tests/**/*.test.ts'],
    environment: 'node',
    env: { FS_GATEWAY_LOG_LEVEL: 'silent' },
    pool: 'forks',
  },
});
