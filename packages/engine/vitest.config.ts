import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';
import { tmpdir } from 'node:os';

export default defineConfig({
  test: {
    env: {
      // Keep test runs away from real data and real services, whatever the root .env says
      DATA_DIR: resolve(tmpdir(), `threadseek-test-${process.pid}`),
      LOG_LEVEL: 'silent',
      VOYAGE_API_KEY: '',
      ANTHROPIC_API_KEY: '',
      OPENROUTER_API_KEY: '',
      INSIGHT_PROVIDER: '',
      // Dates must not depend on the host zone
      TZ: 'America/New_York',
    },
  },
});
