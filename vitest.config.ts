import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const resolve = (p: string) =>
  fileURLToPath(new URL(`./packages/${p}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@tagtree/core': resolve('core'),
      '@tagtree/lexer': resolve('lexer'),
      '@tagtree/html': resolve('html'),
    },
  },
  test: {
    include: ['packages/*/__tests__/**/*.spec.ts'],
  },
})
