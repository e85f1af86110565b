import type { WarningCode } from './codes.js';

export interface GenerationWarning {
  code: WarningCode;
  message: string;
  /** Column the warning is about, when it concerns a schema column */
  column?: string;
  details?: Record<string, unknown>;
}

/**
 * Sink for non-fatal generation warnings.
 * RowGenerator only ever calls warn(); it never inspects the sink.
 */
export interface WarningLogger {
  warn(warning: GenerationWarning): void;
}

export function formatWarning(warning: GenerationWarning): string {
  return `[rowsmith] warning(${warning.code}): ${warning.message}`;
}

export const consoleWarningLogger: WarningLogger = {
  warn(warning) {
    console.warn(formatWarning(warning));
  },
};

/**
 * Logger that keeps warnings in memory so callers can inspect them after
 * construction or generation, optionally forwarding each one.
 */
export class CollectingWarningLogger implements WarningLogger {
  readonly warnings: GenerationWarning[] = [];

  constructor(private readonly forward?: WarningLogger) {}

  warn(warning: GenerationWarning): void {
    this.warnings.push(warning);
    this.forward?.warn(warning);
  }

  countByCode(code: WarningCode): number {
    return this.warnings.filter((w) => w.code === code).length;
  }
}
