export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
}

export class ConsoleReporter implements Reporter {
  readonly warnings: string[] = [];

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
    console.warn(`  WARNING: ${message}`);
  }
}

/** Collects messages without printing; used by tests and embedding callers. */
export class MemoryReporter implements Reporter {
  readonly infos: string[] = [];
  readonly warnings: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }
}
