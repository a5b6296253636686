/**
 * Semantic analysis - validates parsed statements against the schema and user
 * tables they build up, in source order. Nothing is executed.
 */

import { SchemaTable, UserTable } from "./catalog";
import { diagnosticAt, formatDiagnostic, type Diagnostic } from "./diagnostics";
import { createLogger, type Logger } from "./logger";
import {
  err,
  ok,
  type ColumnType,
  type Condition,
  type CreateTableStatement,
  type CreateUserStatement,
  type DeleteStatement,
  type GrantStatement,
  type InsertStatement,
  type LiteralToken,
  type Position,
  type Result,
  type SelectStatement,
  type Statement,
  type UpdateStatement,
} from "./types";

type Check<T> = Result<T, Diagnostic>;

export type AnalyzerOptions = {
  logger?: Logger;
};

export type AnalysisOutput = {
  /** Statements that passed, with WHERE comparisons annotated by column type */
  statements: Statement[];
  schema: SchemaTable;
  users: UserTable;
  /** Non-fatal notices such as repeated grants */
  warnings: Diagnostic[];
};

/**
 * The first semantic error stops the run. A failed result still carries the
 * statements validated before it and the tables as they stood at that point.
 */
export type AnalysisResult =
  | (AnalysisOutput & { success: true })
  | (AnalysisOutput & { success: false; error: Diagnostic });

/**
 * Type a literal would have as a column value: a number with a decimal point
 * is FLOAT, any other number INT, a string TEXT.
 */
export function inferLiteralType(literal: LiteralToken): ColumnType {
  if (literal.type === "STRING") return "TEXT";
  return literal.value.includes(".") ? "FLOAT" : "INT";
}

/**
 * Whether a literal may be stored in (or compared with) a column of the given type.
 * INT takes whole numbers only, FLOAT any number, TEXT strings only.
 */
export function isCompatible(columnType: ColumnType, literal: LiteralToken): boolean {
  switch (columnType) {
    case "INT":
      return literal.type === "NUMBER" && !literal.value.includes(".");
    case "FLOAT":
      return literal.type === "NUMBER";
    case "TEXT":
      return literal.type === "STRING";
  }
}

function semanticError(message: string, position: Position): Diagnostic {
  return diagnosticAt("semantic", message, position);
}

export class SemanticAnalyzer {
  private schema = new SchemaTable();
  private users = new UserTable();
  private warnings: Diagnostic[] = [];
  private logger: Logger;

  constructor(options: AnalyzerOptions = {}) {
    this.logger = options.logger ?? createLogger({ level: "silent", context: "Semantic" });
  }

  /**
   * Validate statements in order, building the schema and user tables as
   * CREATE TABLE, CREATE USER and GRANT statements are reached.
   * Every call starts from empty tables.
   */
  analyze(statements: Statement[]): AnalysisResult {
    this.schema = new SchemaTable();
    this.users = new UserTable();
    this.warnings = [];

    const validated: Statement[] = [];
    this.logger.debug(`Starting analysis on ${statements.length} statement(s)`);

    for (const statement of statements) {
      const result = this.check(statement);

      if (!result.success) {
        this.logger.error(formatDiagnostic(result.error));
        return { success: false, error: result.error, ...this.output(validated) };
      }

      validated.push(result.data);
    }

    return { success: true, ...this.output(validated) };
  }

  getSchema(): SchemaTable {
    return this.schema;
  }

  getUsers(): UserTable {
    return this.users;
  }

  private output(statements: Statement[]): AnalysisOutput {
    return { statements, schema: this.schema, users: this.users, warnings: this.warnings };
  }

  private check(statement: Statement): Check<Statement> {
    switch (statement.type) {
      case "CREATE_TABLE":
        return this.checkCreateTable(statement);
      case "CREATE_USER":
        return this.checkCreateUser(statement);
      case "GRANT":
        return this.checkGrant(statement);
      case "INSERT":
        return this.checkInsert(statement);
      case "SELECT":
        return this.checkSelect(statement);
      case "UPDATE":
        return this.checkUpdate(statement);
      case "DELETE":
        return this.checkDelete(statement);
    }
  }

  private checkCreateTable(statement: CreateTableStatement): Check<Statement> {
    const { table } = statement;

    if (this.schema.has(table.name)) {
      return err(semanticError(`Table '${table.name}' already exists.`, table.position));
    }

    const seen = new Set<string>();
    for (const column of statement.columns) {
      if (seen.has(column.name)) {
        return err(
          semanticError(`Duplicate column '${column.name}' in table '${table.name}'.`, column.position),
        );
      }
      seen.add(column.name);
    }

    this.schema.define(
      table.name,
      statement.columns.map((column) => ({ name: column.name, type: column.dataType })),
    );
    this.logger.debug(`Table '${table.name}' defined with ${statement.columns.length} column(s)`);
    return ok(statement);
  }

  private checkCreateUser(statement: CreateUserStatement): Check<Statement> {
    const { username } = statement;

    if (this.users.has(username.name)) {
      return err(semanticError(`User '${username.name}' already exists.`, username.position));
    }

    this.users.create(username.name, statement.password);
    this.logger.debug(`User '${username.name}' created`);
    return ok(statement);
  }

  private checkGrant(statement: GrantStatement): Check<Statement> {
    const { user, table, privilege } = statement;

    if (!this.users.has(user.name)) {
      return err(semanticError(`User '${user.name}' not found.`, user.position));
    }

    const tableCheck = this.requireTable(table.name, table.position);
    if (!tableCheck.success) return tableCheck;

    if (this.users.grant(user.name, table.name, privilege) === "duplicate") {
      const warning = diagnosticAt(
        "semantic",
        `User '${user.name}' already has ${privilege} on '${table.name}'.`,
        statement,
        "warning",
      );
      this.warnings.push(warning);
      this.logger.warn(formatDiagnostic(warning));
    } else {
      this.logger.debug(`Granted ${privilege} on '${table.name}' to '${user.name}'`);
    }

    return ok(statement);
  }

  private checkInsert(statement: InsertStatement): Check<Statement> {
    const { table, values } = statement;

    const tableCheck = this.requireTable(table.name, table.position);
    if (!tableCheck.success) return tableCheck;

    const columns = this.schema.columns(table.name);
    if (columns.length !== values.length) {
      return err(
        semanticError(
          `Column count mismatch. Expected ${columns.length}, got ${values.length}.`,
          statement,
        ),
      );
    }

    for (let i = 0; i < values.length; i++) {
      const expected = columns[i].type;
      if (!isCompatible(expected, values[i])) {
        return err(semanticError(`Type mismatch at column ${i + 1}. Expected ${expected}.`, values[i]));
      }
    }

    this.logger.debug(`Insert into '${table.name}' validated`);
    return ok(statement);
  }

  private checkSelect(statement: SelectStatement): Check<Statement> {
    const { table } = statement;

    const tableCheck = this.requireTable(table.name, table.position);
    if (!tableCheck.success) return tableCheck;

    for (const column of statement.columns) {
      if (column.type === "STAR") continue;
      const columnCheck = this.requireColumn(table.name, column.name.name, column.name.position);
      if (!columnCheck.success) return columnCheck;
    }

    const where = this.checkOptionalCondition(statement.where, table.name);
    if (!where.success) return where;

    this.logger.debug(`Select from '${table.name}' validated`);
    return ok({ ...statement, where: where.data });
  }

  private checkUpdate(statement: UpdateStatement): Check<Statement> {
    const { table } = statement;

    const tableCheck = this.requireTable(table.name, table.position);
    if (!tableCheck.success) return tableCheck;

    for (const { column, value } of statement.assignments) {
      const columnType = this.requireColumn(table.name, column.name, column.position);
      if (!columnType.success) return columnType;

      if (!isCompatible(columnType.data, value)) {
        return err(
          semanticError(`Type mismatch for column '${column.name}'. Expected ${columnType.data}.`, value),
        );
      }
    }

    const where = this.checkOptionalCondition(statement.where, table.name);
    if (!where.success) return where;

    this.logger.debug(`Update of '${table.name}' validated`);
    return ok({ ...statement, where: where.data });
  }

  private checkDelete(statement: DeleteStatement): Check<Statement> {
    const { table } = statement;

    const tableCheck = this.requireTable(table.name, table.position);
    if (!tableCheck.success) return tableCheck;

    const where = this.checkOptionalCondition(statement.where, table.name);
    if (!where.success) return where;

    this.logger.debug(`Delete from '${table.name}' validated`);
    return ok({ ...statement, where: where.data });
  }

  private checkOptionalCondition(condition: Condition | undefined, table: string): Check<Condition | undefined> {
    if (!condition) return ok(undefined);
    return this.checkCondition(condition, table);
  }

  /**
   * Validate a WHERE tree depth-first, left before right, stopping at the first
   * invalid comparison. Returns a copy with each comparison annotated by the
   * declared type of its column.
   */
  private checkCondition(condition: Condition, table: string): Check<Condition> {
    switch (condition.type) {
      case "COMPARISON": {
        const { column, value } = condition;
        const columnType = this.schema.columnType(table, column.name);

        if (!columnType) {
          return err(
            semanticError(`Column '${column.name}' in WHERE clause not found in table '${table}'.`, column.position),
          );
        }

        if (!isCompatible(columnType, value)) {
          return err(
            semanticError(
              `Type mismatch in WHERE. Column '${column.name}' is ${columnType} but compared with ${inferLiteralType(value)}.`,
              value,
            ),
          );
        }

        return ok({ ...condition, columnType });
      }
      case "AND":
      case "OR": {
        const left = this.checkCondition(condition.left, table);
        if (!left.success) return left;

        const right = this.checkCondition(condition.right, table);
        if (!right.success) return right;

        return ok({ ...condition, left: left.data, right: right.data });
      }
      case "NOT": {
        const operand = this.checkCondition(condition.operand, table);
        if (!operand.success) return operand;

        return ok({ ...condition, operand: operand.data });
      }
    }
  }

  private requireTable(table: string, position: Position): Check<string> {
    if (!this.schema.has(table)) {
      return err(semanticError(`Table '${table}' not found.`, position));
    }
    return ok(table);
  }

  private requireColumn(table: string, column: string, position: Position): Check<ColumnType> {
    const columnType = this.schema.columnType(table, column);
    if (!columnType) {
      return err(semanticError(`Column '${column}' not found in table '${table}'.`, position));
    }
    return ok(columnType);
  }
}

/**
 * Analyze statements in one call with a fresh analyzer
 */
export function analyze(statements: Statement[], options?: AnalyzerOptions): AnalysisResult {
  return new SemanticAnalyzer(options).analyze(statements);
}
