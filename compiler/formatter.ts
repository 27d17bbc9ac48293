import * as prettier from 'prettier';
import { FormatError } from '@core/errors';
import { compilerLogger as logger } from '@core/utils/logger';

export interface FormatOptions {
  printWidth?: number;
}

export interface FormattedSource {
  source: string;
  error?: FormatError;
}

/**
 * Format generated TypeScript with Prettier. On failure the input comes back
 * unchanged together with the error.
 */
export async function formatSource(content: string, options: FormatOptions = {}): Promise<FormattedSource> {
  try {
    const source = await prettier.format(content, {
      parser: 'typescript',
      printWidth: options.printWidth ?? 100,
      tabWidth: 2,
      useTabs: false,
      semi: true,
      singleQuote: false,
      trailingComma: 'all',
      bracketSpacing: true,
      arrowParens: 'always'
    });
    return { source };
  } catch (cause) {
    const error = new FormatError(cause);
    logger.warn(error.message);
    return { source: content, error };
  }
}
