import * as esbuild from 'esbuild';
import * as fs from 'fs/promises';
import * as path from 'path';
import { BuildError } from '@core/errors';
import { DEFAULT_BUILD_TARGET } from '@core/config/loader';
import { compilerLogger as logger } from '@core/utils/logger';

export interface BuildOptions {
  /** Executable to write */
  outputPath: string;
  /** esbuild target, e.g. "node20" */
  target?: string;
  minify?: boolean;
  /** Directory imports are resolved from; defaults to the working directory */
  resolveDir?: string;
}

export interface BuildResult {
  outputPath: string;
  bytes: number;
}

// Where commander is found when the generated source sits in a directory without node_modules
const NODE_PATHS = [path.resolve(__dirname, '..', 'node_modules'), path.resolve(__dirname, '..', '..')];

function isBuildFailure(error: unknown): error is esbuild.BuildFailure {
  return error instanceof Error && 'errors' in error && Array.isArray(error.errors);
}

/**
 * Bundle generated source and its commander dependency into a single
 * executable CommonJS file.
 *
 * @throws {BuildError} with esbuild's diagnostics when bundling fails
 */
export async function buildExecutable(source: string, options: BuildOptions): Promise<BuildResult> {
  const outputPath = path.resolve(options.outputPath);
  let output: esbuild.OutputFile | undefined;

  try {
    const result = await esbuild.build({
      stdin: {
        contents: source,
        loader: 'ts',
        resolveDir: options.resolveDir ?? process.cwd(),
        sourcefile: 'main.ts'
      },
      bundle: true,
      platform: 'node',
      format: 'cjs',
      target: options.target ?? DEFAULT_BUILD_TARGET,
      minify: options.minify ?? false,
      nodePaths: NODE_PATHS,
      write: false,
      banner: { js: '#!/usr/bin/env node' },
      logLevel: 'silent'
    });
    output = result.outputFiles?.[0];
  } catch (error) {
    if (isBuildFailure(error)) {
      const diagnostics = await esbuild.formatMessages(error.errors, { kind: 'error', color: false });
      throw new BuildError(diagnostics.join('').trimEnd(), outputPath, error);
    }
    throw new BuildError(error instanceof Error ? error.message : String(error), outputPath, error);
  }

  if (!output) {
    throw new BuildError('bundler produced no output', outputPath);
  }

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, output.contents, { mode: 0o755 });
  // writeFile only applies the mode when it creates the file
  await fs.chmod(outputPath, 0o755);

  logger.info(`Built ${outputPath}`, { bytes: output.contents.byteLength });
  return { outputPath, bytes: output.contents.byteLength };
}
