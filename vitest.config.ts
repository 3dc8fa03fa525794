import ts from 'typescript';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Transpile TypeScript with tsc rather than esbuild: esbuild renames
  // function expressions that shadow their binding (`const greet = f(function greet() {})`
  // becomes `greet2`), which changes `Function.prototype.name` under test.
  esbuild: false,
  plugins: [
    {
      name: 'typescript-transpile',
      enforce: 'pre',
      transform(code, id) {
        const file = id.split('?')[0];
        if (!/\.[cm]?tsx?$/.test(file) || file.endsWith('.d.ts')) return null;
        const result = ts.transpileModule(code, {
          fileName: file,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            esModuleInterop: true,
            sourceMap: true,
            inlineSources: true,
          },
        });
        return { code: result.outputText, map: result.sourceMapText };
      },
    },
  ],

  test: {
    environment: 'node',

    // Test file patterns
    include: ['packages/*/tests/**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['packages/core/tests/setup.ts'],

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
