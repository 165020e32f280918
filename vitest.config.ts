import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/tests/**/*.{test,spec}.ts', 'packages/**/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**'],
  },
})
