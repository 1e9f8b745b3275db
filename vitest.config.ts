import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

const src = resolve(__dirname, 'src');

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\/(.*)$/, replacement: `${src}/$1` },
      { find: /^@common\/(.*)$/, replacement: `${src}/common/$1` },
      { find: /^@config\/(.*)$/, replacement: `${src}/config/$1` },
      { find: /^@health\/(.*)$/, replacement: `${src}/health/$1` },
      { find: /^@logging\/(.*)$/, replacement: `${src}/logging/$1` },
      { find: /^@metrics\/(.*)$/, replacement: `${src}/metrics/$1` },
      { find: /^@monitoring\/(.*)$/, replacement: `${src}/monitoring/$1` },
      { find: /^@types$/, replacement: `${src}/types/index.ts` },
    ],
  },
  test: {
    environment: 'node',
    include: ['src/**/*.spec.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    pool: 'forks',
  },
});
