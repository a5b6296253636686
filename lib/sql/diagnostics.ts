/**
 * Diagnostics reported by the lexer, parser and semantic analyzer.
 */

import type { Position, Token } from "./types";

export type Phase = "lexical" | "syntax" | "semantic";

export type Severity = "error" | "warning";

export interface Diagnostic {
  phase: Phase;
  severity: Severity;
  message: string;
  line: number;
  column: number;
}

const PHASE_TITLES: Record<Phase, string> = {
  lexical: "Lexical",
  syntax: "Syntax",
  semantic: "Semantic",
};

export function diagnosticAt(
  phase: Phase,
  message: string,
  position: Position,
  severity: Severity = "error",
): Diagnostic {
  return { phase, severity, message, line: position.line, column: position.column };
}

/**
 * Build the syntax diagnostic for an unexpected token.
 * The end-of-input token is reported as such rather than by its empty lexeme.
 */
export function unexpectedToken(token: Token, expectation: string): Diagnostic {
  const message =
    token.type === "EOF"
      ? `${expectation} at end of input`
      : `${expectation}, but found '${token.value}'`;
  return diagnosticAt("syntax", message, token);
}

/**
 * Render a diagnostic the way it is shown to users.
 *
 * @example
 * formatDiagnostic(d) // "[Line 2, Col 13] Syntax Error: Expected 'FROM' after select list, but found 't'"
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const title = PHASE_TITLES[diagnostic.phase];
  const kind = diagnostic.severity === "error" ? "Error" : "Warning";
  return `[Line ${diagnostic.line}, Col ${diagnostic.column}] ${title} ${kind}: ${diagnostic.message}`;
}

export function isError(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "error";
}

export class CompilerError extends Error {
  constructor(
    message: string,
    public diagnostics: Diagnostic[] = [],
  ) {
    super(message);
    this.name = "CompilerError";
  }

  static fromDiagnostics(diagnostics: Diagnostic[]): CompilerError {
    const message =
      diagnostics.length === 1
        ? formatDiagnostic(diagnostics[0])
        : `Compilation failed with ${diagnostics.length} error(s)`;
    return new CompilerError(message, diagnostics);
  }
}
