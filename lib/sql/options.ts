import { z } from "zod";
import type { Result } from "./types";

/**
 * Configuration for a compilation run.
 */
export const CompilerOptionsSchema = z.object({
  /**
   * What the lexer does on an invalid character, unclosed string or
   * unterminated comment.
   * - "recover": report it, emit an ILLEGAL token where one applies, keep scanning
   * - "abort": stop scanning at the first lexical error
   */
  lexicalErrors: z.enum(["recover", "abort"]).default("recover"),

  /**
   * Whether keywords must be written in upper case.
   * Identifiers are always case-sensitive.
   */
  keywordCase: z.enum(["sensitive", "insensitive"]).default("sensitive"),

  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
});

export type CompilerOptions = z.infer<typeof CompilerOptionsSchema>;
export type CompilerOptionsInput = z.input<typeof CompilerOptionsSchema>;
export type LexicalErrorPolicy = CompilerOptions["lexicalErrors"];
export type KeywordCase = CompilerOptions["keywordCase"];

/**
 * Default options - keep going past lexical errors, upper-case keywords only
 */
export const DEFAULT_OPTIONS: CompilerOptions = {
  lexicalErrors: "recover",
  keywordCase: "sensitive",
  logLevel: "warn",
};

/**
 * Strict options - any lexical error ends the run before parsing
 */
export const STRICT_OPTIONS: CompilerOptions = {
  lexicalErrors: "abort",
  keywordCase: "sensitive",
  logLevel: "warn",
};

/**
 * Permissive options - keywords in any case
 */
export const PERMISSIVE_OPTIONS: CompilerOptions = {
  lexicalErrors: "recover",
  keywordCase: "insensitive",
  logLevel: "warn",
};

/**
 * Validate user-supplied options and fill in defaults
 *
 * @returns The resolved options, or the validation messages joined into one string
 */
export function parseCompilerOptions(input: unknown = {}): Result<CompilerOptions, string> {
  const result = CompilerOptionsSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const message = result.error.issues
    .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    .join("; ");
  return { success: false, error: `Invalid compiler options: ${message}` };
}
