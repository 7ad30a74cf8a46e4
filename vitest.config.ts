import { defineConfig } from 'vitest/config'
import path from 'path'
import { fileURLToPath } from 'url'

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    include: ['lib/__tests__/**/*.test.ts', 'cli/__tests__/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['lib/__tests__/setup.ts'],
  },
  resolve: {
    alias: {
      '@': root,
    },
  },
})
