import { defineConfig } from '@playwright/test'
import * as os from 'os'
import * as path from 'path'

// Logging is silenced and all data lands in a throwaway directory
process.env.NODE_ENV = 'test'
process.env.SERMON_CAPTURE_DATA_DIR = path.join(os.tmpdir(), 'sermon-capture-tests')

export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: false,
  forbidOnly: !!process.env.CI,
  retries: 0,
  workers: 1,
  timeout: 30000
})
