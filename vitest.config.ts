import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@sciregistry/kernel': pkg('kernel'),
      '@sciregistry/runtime-host': pkg('runtime-host'),
      '@sciregistry/registry': pkg('registry'),
      '@sciregistry/cli': pkg('cli'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
