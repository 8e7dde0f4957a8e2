import { defineConfig } from 'tsup';
import { readFileSync } from 'node:fs';

// Read package.json version at build time
const packageJson: { version: string } = JSON.parse(readFileSync('./package.json', 'utf-8'));

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  target: 'node20',
  platform: 'node',
  treeshake: true,
  splitting: false,
  sourcemap: true,
  minify: false,
  // Workspace packages export TypeScript sources, so they are bundled
  noExternal: ['@auditor/core', '@auditor/shared-config'],
  external: ['fast-glob'],
  define: {
    'process.env.NODE_ENV': JSON.stringify(process.env.NODE_ENV || 'production'),
    __CLI_VERSION__: JSON.stringify(packageJson.version),
    __CLI_NAME__: JSON.stringify('auditor'),
  },
});
