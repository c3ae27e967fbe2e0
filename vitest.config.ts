import { defineConfig, mergeConfig } from 'vitest/config'
import viteConfig from './vite.config'

export default mergeConfig(viteConfig, defineConfig({
  test: {
    environment: 'jsdom',
    clearMocks: true,
    include: ['src/**/*.test.ts'],
    exclude: [
      'node_modules/**',
      'dist/**'
    ]
  },
}))
