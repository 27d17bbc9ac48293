import chalk from 'chalk';
import { ClidefError, errorMessage } from '@core/errors';
import type { OutputSink } from '@interpreter/eval/action';
import { cliLogger as logger } from '@core/utils/logger';

export interface ErrorHandlerOptions {
  /** Show causes and stack traces */
  debug?: boolean;
}

export class ErrorHandler {
  constructor(
    private readonly stderr: OutputSink,
    private readonly options: ErrorHandlerOptions = {}
  ) {}

  /**
   * Report an error and return the exit code it maps to.
   */
  handleError(error: unknown): number {
    if (error instanceof ClidefError) {
      return this.handleClidefError(error);
    }
    if (error instanceof Error) {
      logger.error('An unexpected error occurred', { error: error.message });
      this.stderr.write(`${chalk.red('Error:')} ${error.message}\n`);
      this.writeCause(error);
      return 1;
    }
    this.stderr.write(`${chalk.red('Error:')} ${errorMessage(error)}\n`);
    return 1;
  }

  private handleClidefError(error: ClidefError): number {
    if (error.canBeWarning()) {
      this.stderr.write(`${chalk.yellow('Warning:')} ${error.message}\n`);
      return 0;
    }
    logger.debug('Command failed', error.toJSON());
    this.stderr.write(`${chalk.red('Error:')} ${error.message}\n`);
    this.writeCause(error);
    return 1;
  }

  private writeCause(error: Error): void {
    if (!this.options.debug) {
      return;
    }
    if (error.cause !== undefined) {
      this.stderr.write(chalk.red(`  Cause: ${errorMessage(error.cause)}\n`));
    }
    if (error.stack) {
      this.stderr.write(chalk.gray(`${error.stack}\n`));
    }
  }
}
