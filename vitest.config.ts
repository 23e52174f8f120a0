import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      ROUTE_PLAN_CACHE_DRIVER: 'memory',
      STATIONS_SOURCE: 'csv',
    },
  },
});
