import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const srcPath = (subdir = '') =>
  fileURLToPath(new URL(`./src/${subdir}`, import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        execArgv: ['--import', 'tsx'],
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/test/**'],
      include: ['src/**/*.ts'],
    },
    include: ['test/**/*.test.ts'],
    globalSetup: './test/setup/global-setup.ts',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      { find: /^@root\/(.*)\.js$/, replacement: `${srcPath()}$1.ts` },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: `${srcPath('services/')}$1.ts`,
      },
      {
        find: /^@plugins\/(.*)\.js$/,
        replacement: `${srcPath('plugins/')}$1.ts`,
      },
      { find: /^@utils\/(.*)\.js$/, replacement: `${srcPath('utils/')}$1.ts` },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: `${srcPath('schemas/')}$1.ts`,
      },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
