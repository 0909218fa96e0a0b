import type { Options } from 'tsup';

/**
 * Build options shared by every workspace package
 *
 * Packages are ESM-only and run on Node.js 20. Pass overrides for the
 * executable (no declarations, bundled workspace dependencies).
 */
export function defineBaseConfig(options: Options = {}): Options {
  return {
    entry: { index: 'src/index.ts' },
    format: ['esm'],
    platform: 'node',
    target: 'node20',
    dts: true,
    clean: true,
    sourcemap: true,
    ...options,
  };
}
