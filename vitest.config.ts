import { defineConfig } from 'vitest/config'
import path from 'path'

export default defineConfig({
  define: {
    __BUILD_NUMBER__: JSON.stringify('test'),
  },
  resolve: {
    alias: {
      '@': path.resolve(__dirname, './src'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
})
