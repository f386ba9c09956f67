import type { ByteSpan } from "./span";

export type Severity = "bug" | "error" | "warning";

/** Supplementary text attached to a diagnostic, never reported alone */
export interface SubDiagnostic {
  severity: "help" | "note";
  message: string;
  span?: ByteSpan;
}

export interface Label {
  span: ByteSpan;
  message?: string;
}

export interface Diagnostic {
  severity: Severity;
  code: string;
  message: string;
  /** Where the problem is, if it can be pinned to the text */
  span?: ByteSpan;
  /** Secondary locations */
  labels: Label[];
  children: SubDiagnostic[];
}

/** Fluent helper for building diagnostics */
export class DiagnosticBuilder {
  private readonly diagnostic: Diagnostic;

  constructor(severity: Severity, code: string, message: string) {
    this.diagnostic = { severity, code, message, labels: [], children: [] };
  }

  at(span: ByteSpan): this {
    this.diagnostic.span = span;
    return this;
  }

  label(span: ByteSpan, message?: string): this {
    this.diagnostic.labels.push(message === undefined ? { span } : { span, message });
    return this;
  }

  help(message: string, span?: ByteSpan): this {
    this.diagnostic.children.push(
      span === undefined ? { severity: "help", message } : { severity: "help", message, span },
    );
    return this;
  }

  note(message: string, span?: ByteSpan): this {
    this.diagnostic.children.push(
      span === undefined ? { severity: "note", message } : { severity: "note", message, span },
    );
    return this;
  }

  build(): Diagnostic {
    return this.diagnostic;
  }
}

export function bug(code: string, message: string): DiagnosticBuilder {
  return new DiagnosticBuilder("bug", code, message);
}

export function error(code: string, message: string): DiagnosticBuilder {
  return new DiagnosticBuilder("error", code, message);
}

export function warning(code: string, message: string): DiagnosticBuilder {
  return new DiagnosticBuilder("warning", code, message);
}

/**
 * Diagnostics accumulated by one pipeline stage. `take` hands the current
 * batch to the caller and starts a new one.
 */
export class DiagnosticBag {
  private items: Diagnostic[] = [];

  add(diagnostic: Diagnostic | DiagnosticBuilder): void {
    this.items.push(
      diagnostic instanceof DiagnosticBuilder ? diagnostic.build() : diagnostic,
    );
  }

  take(): Diagnostic[] {
    const taken = this.items;
    this.items = [];
    return taken;
  }
}
