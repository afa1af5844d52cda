import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'cli/index': 'src/cli/index.ts',
  },
  format: ['esm'],
  target: 'node20',
  clean: true,
  outDir: 'dist',
  // Dependencies stay external; axios and ajv resolve their own Node entry points
  external: ['axios', 'ajv', 'ajv-formats', 'chalk', 'commander', 'dotenv'],
  shims: false,
  dts: true, // Generate declaration files
  splitting: true, // Split output into chunks
  sourcemap: true, // Generate sourcemaps
  // Post-build hook to make the CLI executable
  onSuccess: 'chmod +x dist/cli/index.js',
});
