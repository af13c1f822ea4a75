import { defineConfig } from '@playwright/test';

// Specs call the report functions and route handlers in-process; no browser is launched
export default defineConfig({
  testDir: './tests',
  timeout: 30000,
  fullyParallel: false,
  retries: 0,
  workers: 1,
  outputDir: 'tests/test-results',
});
