/**
 * Main entry point for the clidef CLI application.
 */
import { main } from './index';

export { main };

const controller = new AbortController();
process.on('SIGINT', () => controller.abort());

main(process.argv.slice(2), { signal: controller.signal }).then(
  code => {
    process.exitCode = code;
  },
  error => {
    console.error(error);
    process.exitCode = 1;
  }
);
