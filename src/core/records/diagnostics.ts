import type { ErrorCode } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A problem with one file that did not stop the walk.
 */
export interface Diagnostic {
  /** Repo-relative path of the file the problem was found in */
  file: string;
  code: ErrorCode;
  message: string;
  severity: DiagnosticSeverity;
}

/**
 * Collects per-file problems and echoes them to the logger as they arrive.
 */
export class Diagnostics {
  private readonly entries: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    const line = `${diagnostic.file}: ${diagnostic.message}`;
    switch (diagnostic.severity) {
      case 'error':
        logger.error(line);
        break;
      case 'warning':
        logger.warn(line);
        break;
      case 'info':
        logger.debug(line);
        break;
    }
  }

  list(): Diagnostic[] {
    return [...this.entries];
  }

  forFile(file: string): Diagnostic[] {
    return this.entries.filter((entry) => entry.file === file);
  }

  count(severity?: DiagnosticSeverity): number {
    if (!severity) {
      return this.entries.length;
    }
    return this.entries.filter((entry) => entry.severity === severity).length;
  }
}
