import { transformWithEsbuild, type Plugin } from 'vite';
import { defineConfig } from 'vitest/config';

// Vite's built-in esbuild transform forces `keepNames: false`, so tests that
// rely on function names (tool() derives a tool's name from its handler)
// would see esbuild's collision-renamed identifiers. Transpile TypeScript
// here with `keepNames` enabled instead.
function keepNamesTypeScript(): Plugin {
  return {
    name: 'keep-names-typescript',
    enforce: 'pre',
    async transform(code, id) {
      if (!/\.(m?ts|tsx)$/.test(id.split('?')[0])) return null;
      const result = await transformWithEsbuild(code, id, {
        target: 'esnext',
        keepNames: true,
      });
      return { code: result.code, map: result.map };
    },
  };
}

export default defineConfig({
  esbuild: false,
  plugins: [keepNamesTypeScript()],
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'silent',
      GAGITECK_API_KEY: '',
      GAGITECK_BASE_URL: '',
      GAGITECK_TIMEOUT_MS: '',
      GAGITECK_DEBUG: '',
      AGENT_DEFAULT_MODEL: '',
      AGENT_MAX_TURNS: '',
      AGENT_MAX_TOKENS: '',
      AGENT_TEMPERATURE: '',
      DEFAULT_LLM_PROVIDER: '',
      OPENAI_API_KEY: '',
      ANTHROPIC_API_KEY: '',
      GROK_API_KEY: '',
    },
  },
});
