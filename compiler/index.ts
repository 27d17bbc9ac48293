import * as fs from 'fs/promises';
import type { Specification } from '@core/types/spec';
import { generateSource, type GenerateOptions, type GeneratedSource } from './generator';
import { buildExecutable, type BuildOptions, type BuildResult } from './builder';

export interface CompileOptions extends GenerateOptions, BuildOptions {
  /** Also write the generated TypeScript here */
  sourcePath?: string;
}

export interface CompileResult extends BuildResult {
  generated: GeneratedSource;
}

/**
 * Generate a program from the specification and bundle it into an executable.
 */
export async function compile(spec: Specification, options: CompileOptions): Promise<CompileResult> {
  const generated = await generateSource(spec, options);
  if (options.sourcePath) {
    await fs.writeFile(options.sourcePath, generated.source, 'utf8');
  }
  const built = await buildExecutable(generated.source, options);
  return { ...built, generated };
}

export { generateSource, buildExecutable };
export type { GenerateOptions, GeneratedSource, BuildOptions, BuildResult };
export { formatSource } from './formatter';
export type { FormatOptions, FormattedSource } from './formatter';
export { scanFeatures, RENDER_FEATURE } from './feature-usage';
export type { Feature } from './feature-usage';
export { IdentifierAllocator, toPascalCase } from './identifiers';
export { SourceBackend, quote } from './SourceBackend';
export { supportRoutines } from './support-routines';
