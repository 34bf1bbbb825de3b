export type DiagnosticSeverity = "error" | "warning" | "note";

export interface Diagnostic {
  /** Path as the build tool reported it; may be relative or absolute. */
  filePath: string;
  /** 1-based. */
  line: number;
  /** 1-based; absent when the tool does not report one. */
  column?: number;
  severity: DiagnosticSeverity;
  message: string;
}

export interface DiagnosticSummary {
  errors: number;
  warnings: number;
  notes: number;
}
