import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@fieldport\/core$/, replacement: packageSource('core') },
      { find: /^@fieldport\/connector-cloud$/, replacement: packageSource('connector-cloud') },
      { find: /^@fieldport\/migration$/, replacement: packageSource('migration') },
      { find: /^@fieldport\/cli$/, replacement: packageSource('cli') },
    ],
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
