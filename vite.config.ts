import { defineConfig } from 'vite';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';
import type { Plugin } from 'vite';

const root = fileURLToPath(new URL('.', import.meta.url));

/**
 * Rollup plugin to prepend a shebang line to the CLI chunk.
 */
function shebangPlugin(): Plugin {
  return {
    name: 'shebang',
    generateBundle(_options, bundle) {
      for (const [fileName, chunk] of Object.entries(bundle)) {
        if (fileName.includes('exifsweep.cli') && chunk.type === 'chunk') {
          chunk.code = '#!/usr/bin/env node\n' + chunk.code;
        }
      }
    },
  };
}

export default defineConfig({
  plugins: [
    dts({
      include: ['src/**/*'],
      exclude: ['src/bin.ts'],
    }),
    shebangPlugin(),
  ],
  build: {
    lib: {
      entry: {
        exifsweep: resolve(root, 'src/index.ts'),
        'exifsweep.cli': resolve(root, 'src/bin.ts'),
      },
      formats: ['es', 'cjs'],
      fileName: (format, entryName) => {
        const ext = format === 'es' ? 'js' : 'cjs';
        return `${entryName}.${ext}`;
      },
    },
    rollupOptions: {
      external: [
        /^node:/,
        'pino',
        'pino-pretty',
        'zod',
        'dotenv',
      ],
      output: {
        preserveModules: false,
        exports: 'named',
      },
    },
    sourcemap: true,
    minify: 'esbuild',
    target: 'node20',
  },
});
