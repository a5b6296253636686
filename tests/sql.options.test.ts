import { afterEach, describe, expect, test, vi } from "vitest";
import {
  DEFAULT_OPTIONS,
  PERMISSIVE_OPTIONS,
  STRICT_OPTIONS,
  parseCompilerOptions,
} from "../lib/sql/options";
import { Logger, createLogger } from "../lib/sql/logger";
import { SemanticAnalyzer } from "../lib/sql/analyzer";
import { Lexer } from "../lib/sql/lexer";
import { Parser } from "../lib/sql/parser";

describe("SQL Options - Validation", () => {
  test("missing options resolve to the defaults", () => {
    const result = parseCompilerOptions();

    expect(result).toEqual({ success: true, data: DEFAULT_OPTIONS });
  });

  test("partial options are filled in", () => {
    const result = parseCompilerOptions({ keywordCase: "insensitive" });

    expect(result).toEqual({
      success: true,
      data: { lexicalErrors: "recover", keywordCase: "insensitive", logLevel: "warn" },
    });
  });

  test("the presets are valid options", () => {
    for (const preset of [DEFAULT_OPTIONS, STRICT_OPTIONS, PERMISSIVE_OPTIONS]) {
      expect(parseCompilerOptions(preset)).toEqual({ success: true, data: preset });
    }
  });

  test("an unknown policy names the offending field", () => {
    const result = parseCompilerOptions({ lexicalErrors: "skip" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.startsWith("Invalid compiler options: lexicalErrors: ")).toBe(true);
  });

  test("every invalid field is reported", () => {
    const result = parseCompilerOptions({ lexicalErrors: "skip", logLevel: "loud" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toContain("lexicalErrors: ");
    expect(result.error).toContain("; logLevel: ");
  });

  test("a non-object is rejected", () => {
    const result = parseCompilerOptions(42);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.startsWith("Invalid compiler options: options: ")).toBe(true);
  });
});

describe("SQL Options - Logging", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("messages below the level are dropped", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger({ level: "warn", context: "Parser" });

    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Parser] shown");
  });

  test("silent drops everything", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({ level: "silent" });

    logger.error("hidden");

    expect(error).not.toHaveBeenCalled();
  });

  test("a child keeps the level and takes its own context", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = createLogger({ level: "debug" }).child("Lexer");

    logger.debug("scanning");

    expect(debug).toHaveBeenCalledWith("[Lexer] scanning");
  });

  test("phases used on their own print nothing by default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const { tokens, errors } = new Lexer("SELECT @ name t;\nSELECT * FROM t;").tokenize();
    const parsed = new Parser(tokens).parse();
    const analysis = new SemanticAnalyzer().analyze(parsed.statements);

    expect([errors.length, parsed.errors.length, analysis.success]).toEqual([1, 1, false]);

    expect(warn).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  test("the analyzer logs a repeated grant as a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new Logger({ level: "warn", context: "Semantic" });
    const source = [
      "CREATE TABLE t (id INT);",
      "CREATE USER ali IDENTIFIED BY 'pw';",
      "GRANT DELETE ON t TO ali;",
      "GRANT DELETE ON t TO ali;",
    ].join("\n");
    const { tokens } = new Lexer(source, { logger }).tokenize();
    const { statements } = new Parser(tokens, { logger }).parse();

    new SemanticAnalyzer({ logger }).analyze(statements);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[Semantic] [Line 4, Col 1] Semantic Warning: User 'ali' already has DELETE on 't'.",
    );
  });
});
