import { describe, expect, test } from "vitest";
import {
  CompilerError,
  PERMISSIVE_OPTIONS,
  STRICT_OPTIONS,
  assertCompiled,
  compileSQL,
  formatDiagnostic,
} from "../lib/sql";

const quiet = { logLevel: "silent" } as const;

describe("SQL Compile - Pipeline", () => {
  test("a valid script yields statements, schema and users", () => {
    const result = compileSQL(
      [
        "CREATE TABLE students (id INT, name TEXT, grade FLOAT);",
        "INSERT INTO students VALUES (1, 'Ali', 85.5);",
        "CREATE USER ali IDENTIFIED BY 'test-secret';",
        "GRANT SELECT ON students TO ali;",
        "SELECT name FROM students WHERE id = 1;",
      ].join("\n"),
      quiet,
    );

    expect(result.success).toBe(true);
    expect(result.diagnostics).toEqual([]);
    expect(result.statements.map((s) => s.type)).toEqual([
      "CREATE_TABLE",
      "INSERT",
      "CREATE_USER",
      "GRANT",
      "SELECT",
    ]);
    expect(result.schema).toEqual({
      students: [
        { name: "id", type: "INT" },
        { name: "name", type: "TEXT" },
        { name: "grade", type: "FLOAT" },
      ],
    });
    expect(result.users).toEqual({
      ali: { password: "test-secret", grants: [{ table: "students", privilege: "SELECT" }] },
    });
    expect(result.tokens[result.tokens.length - 1].type).toBe("EOF");
  });

  test("a syntax error is reported and the rest of the batch is analyzed", () => {
    const result = compileSQL(
      "CREATE TABLE t (id INT, name TEXT);\nSELECT name t WHERE id = 1;\nINSERT INTO t VALUES (2,'x');",
      quiet,
    );

    expect(result.success).toBe(false);
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "[Line 2, Col 13] Syntax Error: Expected 'FROM' after select list, but found 't'",
    ]);
    expect(result.statements.map((s) => s.type)).toEqual(["CREATE_TABLE", "INSERT"]);
  });

  test("diagnostics are listed lexical, then syntax, then semantic", () => {
    const result = compileSQL("SELECT @ x FROM t;\nSELECT y t;\nINSERT INTO t VALUES (1);", quiet);

    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "[Line 1, Col 8] Lexical Error: Invalid character '@'",
      "[Line 2, Col 10] Syntax Error: Expected 'FROM' after select list, but found 't'",
      "[Line 1, Col 17] Semantic Error: Table 't' not found.",
    ]);
    expect(result.statements).toEqual([]);
  });

  test("a repeated grant is a warning and the run still succeeds", () => {
    const result = compileSQL(
      [
        "CREATE TABLE t (id INT);",
        "CREATE USER ali IDENTIFIED BY 'pw';",
        "GRANT SELECT ON t TO ali;",
        "GRANT SELECT ON t TO ali;",
      ].join("\n"),
      quiet,
    );

    expect(result.success).toBe(true);
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "[Line 4, Col 1] Semantic Warning: User 'ali' already has SELECT on 't'.",
    ]);
    expect(result.users.ali.grants).toEqual([{ table: "t", privilege: "SELECT" }]);
  });

  test("a semantic error keeps the tables built before it", () => {
    const result = compileSQL(
      "CREATE TABLE t (id INT);\nINSERT INTO t VALUES ('one');\nCREATE TABLE u (id INT);",
      quiet,
    );

    expect(result.success).toBe(false);
    expect(result.schema).toEqual({ t: [{ name: "id", type: "INT" }] });
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "[Line 2, Col 23] Semantic Error: Type mismatch at column 1. Expected INT.",
    ]);
  });

  test("positions after an emoji count it as one character", () => {
    const result = compileSQL("CREATE TABLE t (a TEXT, b INT);\nINSERT INTO t VALUES ('😀', 1.5);", quiet);

    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "[Line 2, Col 28] Semantic Error: Type mismatch at column 2. Expected INT.",
    ]);
  });
});

describe("SQL Compile - Options", () => {
  const source = "CREATE TABLE t (id INT);\nINSERT INTO t VALUES (1) $;";

  test("lexical errors are skipped by default", () => {
    const result = compileSQL(source, quiet);

    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      "[Line 2, Col 26] Lexical Error: Invalid character '$'",
    ]);
    expect(result.success).toBe(false);
    expect(result.statements).toHaveLength(2);
    expect(result.schema).toEqual({ t: [{ name: "id", type: "INT" }] });
  });

  test("strict options stop before parsing", () => {
    const result = compileSQL(source, { ...STRICT_OPTIONS, ...quiet });

    expect(result.success).toBe(false);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.statements).toEqual([]);
    expect(result.schema).toEqual({});
    expect(result.tokens[result.tokens.length - 1]).toMatchObject({ type: "EOF", line: 2, column: 27 });
  });

  test("lower-case keywords need permissive options", () => {
    const source = "create table t (id int);\ninsert into t values (1);";

    expect(compileSQL(source, quiet).success).toBe(false);
    expect(compileSQL(source, { ...PERMISSIVE_OPTIONS, ...quiet }).success).toBe(true);
  });

  test("invalid options throw a CompilerError", () => {
    const options = JSON.parse('{ "lexicalErrors": "skip" }');

    expect(() => compileSQL("SELECT * FROM t;", options)).toThrow(CompilerError);
    expect(() => compileSQL("SELECT * FROM t;", options)).toThrow("Invalid compiler options: lexicalErrors:");
  });
});

describe("SQL Compile - assertCompiled", () => {
  test("returns a successful result unchanged", () => {
    const result = compileSQL("CREATE TABLE t (id INT);", quiet);

    expect(assertCompiled(result)).toBe(result);
  });

  test("a single error becomes the message", () => {
    const result = compileSQL("SELECT * FROM nope;", quiet);

    expect(() => assertCompiled(result)).toThrow("[Line 1, Col 15] Semantic Error: Table 'nope' not found.");
  });

  test("several errors are counted and carried", () => {
    const result = compileSQL("SELECT name t;\nSELECT * FROM nope;", quiet);

    try {
      assertCompiled(result);
      throw new Error("Should have thrown error");
    } catch (error) {
      expect(error).toBeInstanceOf(CompilerError);
      if (!(error instanceof CompilerError)) return;
      expect(error.message).toBe("Compilation failed with 2 error(s)");
      expect(error.diagnostics.map((d) => d.phase)).toEqual(["syntax", "semantic"]);
    }
  });
});
