/**
 * Non-fatal conditions found while decoding or building a log.
 * They never interrupt processing; they are collected on the finished Log.
 */

export enum DiagnosticCode {
  UNSUPPORTED_REVISION = 'UNSUPPORTED_REVISION',
  INVALID_TEXT = 'INVALID_TEXT',
  UNRECOGNIZED_CODE = 'UNRECOGNIZED_CODE',
  MASTER_CYCLE = 'MASTER_CYCLE',
}

export interface DecodeDiagnostic {
  readonly code: DiagnosticCode;
  readonly message: string;
  /** Byte offset in the input, when the condition is tied to one */
  readonly offset?: number;
  /** How many times the condition was seen (aggregated codes) */
  readonly count?: number;
}

/**
 * Collects diagnostics and folds repeated unrecognized-code reports into one entry per code
 */
export class DiagnosticSink {
  private readonly entries: DecodeDiagnostic[] = [];
  private readonly unrecognized = new Map<string, number>();

  public add(diagnostic: DecodeDiagnostic): void {
    this.entries.push(diagnostic);
  }

  public addAll(diagnostics: readonly DecodeDiagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.entries.push(diagnostic);
    }
  }

  /**
   * Count one occurrence of an unknown discriminant, e.g. `stateChange=40`
   */
  public countUnrecognized(field: string, code: number): void {
    const key = `${field}=${code}`;
    this.unrecognized.set(key, (this.unrecognized.get(key) ?? 0) + 1);
  }

  public toArray(): DecodeDiagnostic[] {
    const folded: DecodeDiagnostic[] = [];
    for (const [key, count] of this.unrecognized) {
      folded.push({
        code: DiagnosticCode.UNRECOGNIZED_CODE,
        message: `Unrecognized ${key}`,
        count,
      });
    }
    return [...this.entries, ...folded];
  }
}
