import { SemanticAnalyzer } from "./analyzer";
import type { SchemaSnapshot, UserSnapshot } from "./catalog";
import { CompilerError, isError, type Diagnostic } from "./diagnostics";
import { Lexer } from "./lexer";
import { createLogger } from "./logger";
import { parseCompilerOptions, type CompilerOptionsInput } from "./options";
import { Parser } from "./parser";
import type { Statement, Token } from "./types";

export type CompileResult = {
  /** True when no phase reported an error; warnings do not count */
  success: boolean;
  tokens: Token[];
  /** Statements that parsed and passed semantic analysis */
  statements: Statement[];
  /** Lexical, then syntax, then semantic diagnostics */
  diagnostics: Diagnostic[];
  schema: SchemaSnapshot;
  users: UserSnapshot;
};

/**
 * Tokenize, parse and analyze a batch of statements
 *
 * @param source - SQL source text, any number of statements
 * @param options - Optional compiler options (defaults to DEFAULT_OPTIONS)
 * @returns Everything each phase produced, even when a phase reported errors
 * @throws CompilerError if the options are invalid
 *
 * @example
 * const result = compileSQL("CREATE TABLE t (id INT); INSERT INTO t VALUES (1);");
 *
 * @example
 * // Stop at the first lexical error
 * const result = compileSQL(source, STRICT_OPTIONS);
 */
export function compileSQL(source: string, options: CompilerOptionsInput = {}): CompileResult {
  const parsedOptions = parseCompilerOptions(options);
  if (!parsedOptions.success) {
    throw new CompilerError(parsedOptions.error);
  }
  const { lexicalErrors, keywordCase, logLevel } = parsedOptions.data;
  const logger = createLogger({ level: logLevel, context: "SQL" });

  const lexed = new Lexer(source, { lexicalErrors, keywordCase, logger: logger.child("Lexer") }).tokenize();
  const diagnostics: Diagnostic[] = [...lexed.errors];

  if (lexicalErrors === "abort" && lexed.errors.length > 0) {
    logger.error("Lexical analysis aborted; skipping parsing");
    return {
      success: false,
      tokens: lexed.tokens,
      statements: [],
      diagnostics,
      schema: {},
      users: {},
    };
  }

  const parsed = new Parser(lexed.tokens, { logger: logger.child("Parser") }).parse();
  diagnostics.push(...parsed.errors);

  const analysis = new SemanticAnalyzer({ logger: logger.child("Semantic") }).analyze(parsed.statements);
  diagnostics.push(...analysis.warnings);
  if (!analysis.success) {
    diagnostics.push(analysis.error);
  }

  logger.info(
    `Compiled ${analysis.statements.length} statement(s) with ${diagnostics.filter(isError).length} error(s)`,
  );

  return {
    success: !diagnostics.some(isError),
    tokens: lexed.tokens,
    statements: analysis.statements,
    diagnostics,
    schema: analysis.schema.toJSON(),
    users: analysis.users.toJSON(),
  };
}

/**
 * Throw a CompilerError carrying every error diagnostic unless the run succeeded
 */
export function assertCompiled(result: CompileResult): CompileResult {
  if (!result.success) {
    throw CompilerError.fromDiagnostics(result.diagnostics.filter(isError));
  }
  return result;
}

export { Lexer, tokenize } from "./lexer";
export type { LexerOptions, LexResult } from "./lexer";
export { Parser, parse } from "./parser";
export type { ParserOptions, ParseOutput } from "./parser";
export { SemanticAnalyzer, analyze, inferLiteralType, isCompatible } from "./analyzer";
export type { AnalyzerOptions, AnalysisOutput, AnalysisResult } from "./analyzer";
export { SchemaTable, UserTable } from "./catalog";
export type { ColumnInfo, GrantInfo, UserInfo, SchemaSnapshot, UserSnapshot } from "./catalog";
export { CompilerError, formatDiagnostic, isError } from "./diagnostics";
export type { Diagnostic, Phase, Severity } from "./diagnostics";
export { Logger, createLogger } from "./logger";
export type { LogLevel, LoggerOptions } from "./logger";
export {
  CompilerOptionsSchema,
  DEFAULT_OPTIONS,
  PERMISSIVE_OPTIONS,
  STRICT_OPTIONS,
  parseCompilerOptions,
} from "./options";
export type { CompilerOptions, CompilerOptionsInput, KeywordCase, LexicalErrorPolicy } from "./options";
export {
  COLUMN_TYPES,
  KEYWORDS,
  PRIVILEGES,
  isColumnType,
  isKeyword,
  isLiteralToken,
  isPrivilege,
} from "./types";
export type {
  Assignment,
  ColumnDefinition,
  ColumnType,
  ComparisonCondition,
  ComparisonOperator,
  Condition,
  CreateTableStatement,
  CreateUserStatement,
  DeleteStatement,
  GrantStatement,
  InsertStatement,
  Keyword,
  LiteralToken,
  Name,
  Position,
  Privilege,
  Result,
  SelectColumn,
  SelectStatement,
  Statement,
  StatementType,
  Token,
  TokenType,
  UpdateStatement,
} from "./types";
