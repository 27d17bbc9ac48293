import { defineConfig } from 'tsup';
import type { Options } from 'tsup';
// Runtime dependencies stay external; generated programs bundle commander themselves
const externalDependencies = ['chalk', 'commander', 'esbuild', 'js-yaml', 'prettier', 'winston'];

type EsbuildOptions = Parameters<NonNullable<Options['esbuildOptions']>>[0];

const esbuildOptions = (options: EsbuildOptions) => {
  options.alias = {
    '@core': './core',
    '@services': './services',
    '@interpreter': './interpreter',
    '@compiler': './compiler',
    '@cli': './cli',
    '@api': './api'
  };

  options.platform = 'node';
  options.resolveExtensions = ['.ts', '.js', '.json'];
  options.target = 'node20';

  return options;
};

export default defineConfig([
  // Library build
  {
    entry: {
      index: 'api/index.ts'
    },
    format: ['cjs'],
    dts: false,
    clean: true,
    sourcemap: true,
    splitting: false,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    esbuildOptions
  },
  // CLI build
  {
    entry: {
      cli: 'cli/cli-entry.ts'
    },
    format: 'cjs',
    dts: false,
    clean: false,
    sourcemap: true,
    outDir: 'dist',
    outExtension() {
      return { js: '.cjs' };
    },
    external: externalDependencies,
    banner: {
      js: '#!/usr/bin/env node'
    },
    esbuildOptions
  }
]);
