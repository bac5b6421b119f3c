import { defineConfig } from 'vitest/config'
import swc from 'unplugin-swc'

export default defineConfig({
  // SWC instead of vite's esbuild transform, which renames shadowed function
  // expressions (square -> square2); tests assert on names taken from fn.name
  plugins: [swc.vite({ jsc: { target: 'es2022' } })],
  esbuild: false,
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
    },
    testTimeout: 10_000,
  },
})
