import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['skip-visualizer/src/tests/**/*.test.ts'],
    environment: 'node',
  },
})
