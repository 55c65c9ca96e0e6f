/**
 * Operator-facing output. Errors go to stderr, everything else to stdout.
 */

export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Section banner, e.g. before each project of a batch. */
  header(message: string): void;
}

export class ConsoleReporter implements Reporter {
  info(message: string): void {
    console.log(message);
  }

  success(message: string): void {
    console.log(`✅ ${message}`);
  }

  warn(message: string): void {
    console.log(`⚠️  ${message}`);
  }

  error(message: string): void {
    console.error(`❌ ${message}`);
  }

  header(message: string): void {
    console.log(`\n###   ${message}   ###`);
  }
}
