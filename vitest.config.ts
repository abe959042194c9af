import { defineConfig } from 'vitest/config'
import { version } from './package.json'

export default defineConfig({
  define: { __VERSION__: JSON.stringify(version) },
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
