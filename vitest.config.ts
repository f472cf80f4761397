import path from 'path'
import { configDefaults, defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/*.test.ts'],
    exclude: [...configDefaults.exclude, '**/node_modules/**', '**/dist/**'],
    setupFiles: ['./vitest.setup.ts'],
  },
  resolve: {
    alias: {
      forcequery: path.resolve(__dirname, 'packages/ts-sdk/src/index.ts'),
    },
  },
})
