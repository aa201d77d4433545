import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/tests/**/*.test.ts'],
    env: {
      HMM_LOG_LEVEL: 'silent'
    }
  }
})
