import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        // Lets the listener-lifetime tests force a collection
        execArgv: ['--expose-gc']
      }
    }
  }
})
