import { defineConfig } from 'vitest/config'

export default defineConfig({
  esbuild: {
    jsx: 'transform',
    jsxFactory: 'jsx',
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})
