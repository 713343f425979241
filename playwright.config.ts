import { defineConfig } from '@playwright/test';

// Tests parse HTML with cheerio and never start a browser
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.test.ts',
  fullyParallel: true,
  forbidOnly: !!process.env.CI,
  retries: 0,
  timeout: 30000,
});
