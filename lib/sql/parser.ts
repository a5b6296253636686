import { formatDiagnostic, unexpectedToken, type Diagnostic } from "./diagnostics";
import { createLogger, type Logger } from "./logger";
import {
  err,
  isColumnType,
  isLiteralToken,
  isPrivilege,
  ok,
  type Assignment,
  type ColumnDefinition,
  type ComparisonOperator,
  type Condition,
  type CreateTableStatement,
  type CreateUserStatement,
  type DeleteStatement,
  type GrantStatement,
  type InsertStatement,
  type Keyword,
  type LiteralToken,
  type Name,
  type Result,
  type SelectColumn,
  type SelectStatement,
  type Statement,
  type Token,
  type TokenType,
  type UpdateStatement,
} from "./types";

type ParseStep<T> = Result<T, Diagnostic>;

export type ParserOptions = {
  logger?: Logger;
};

export type ParseOutput = {
  statements: Statement[];
  errors: Diagnostic[];
};

// Keywords that may begin a statement; recovery stops in front of them
const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
  "CREATE",
  "INSERT",
  "SELECT",
  "UPDATE",
  "DELETE",
  "GRANT",
]);

const COMPARISON_OPERATORS: ReadonlyMap<string, ComparisonOperator> = new Map([
  ["=", "="],
  ["!=", "!="],
  ["<>", "!="],
  ["<", "<"],
  ["<=", "<="],
  [">", ">"],
  [">=", ">="],
]);

export class Parser {
  private tokens: Token[];
  private current: number = 0;
  private logger: Logger;

  constructor(tokens: Token[], options: ParserOptions = {}) {
    this.tokens = normalizeTokens(tokens);
    this.logger = options.logger ?? createLogger({ level: "silent", context: "Parser" });
  }

  /**
   * Parse every statement in the token stream.
   * A statement that fails to parse is reported and skipped; parsing resumes
   * at the next statement boundary.
   */
  parse(): ParseOutput {
    this.current = 0;
    const statements: Statement[] = [];
    const errors: Diagnostic[] = [];

    while (!this.isAtEnd()) {
      const result = this.parseStatement();

      if (result.success) {
        this.logger.debug(`Parsed ${result.data.type} at line ${result.data.line}`);
        statements.push(result.data);
      } else {
        errors.push(result.error);
        this.logger.warn(formatDiagnostic(result.error));
        this.synchronize();
      }
    }

    return { statements, errors };
  }

  private parseStatement(): ParseStep<Statement> {
    const token = this.peek();

    if (token.type === "KEYWORD") {
      switch (token.keyword) {
        case "CREATE":
          return this.parseCreate();
        case "INSERT":
          return this.parseInsert();
        case "SELECT":
          return this.parseSelect();
        case "UPDATE":
          return this.parseUpdate();
        case "DELETE":
          return this.parseDelete();
        case "GRANT":
          return this.parseGrant();
      }
    }

    return err(
      unexpectedToken(
        token,
        "Expected statement keyword (CREATE, INSERT, SELECT, UPDATE, DELETE, GRANT)",
      ),
    );
  }

  private parseCreate(): ParseStep<Statement> {
    const keyword = this.advance();

    if (this.match("KEYWORD", "TABLE")) return this.parseCreateTable(keyword);
    if (this.match("KEYWORD", "USER")) return this.parseCreateUser(keyword);

    return err(unexpectedToken(this.peek(), "Expected 'TABLE' or 'USER' after 'CREATE'"));
  }

  // CREATE TABLE name ( [column TYPE {, column TYPE}] ) ;
  private parseCreateTable(keyword: Token): ParseStep<CreateTableStatement> {
    const table = this.parseName("Expected table name after 'TABLE'");
    if (!table.success) return table;

    const open = this.consume("LPAREN", "Expected '(' after table name");
    if (!open.success) return open;

    const columns: ColumnDefinition[] = [];
    if (!this.check("RPAREN")) {
      do {
        const column = this.parseColumnDefinition();
        if (!column.success) return column;
        columns.push(column.data);
      } while (this.match("COMMA"));
    }

    const close = this.consume("RPAREN", "Expected ')' after column definitions");
    if (!close.success) return close;

    const end = this.consume("SEMICOLON", "Expected ';' after CREATE TABLE statement");
    if (!end.success) return end;

    return ok({
      type: "CREATE_TABLE",
      table: table.data,
      columns,
      line: keyword.line,
      column: keyword.column,
    });
  }

  private parseColumnDefinition(): ParseStep<ColumnDefinition> {
    const name = this.parseName("Expected column name");
    if (!name.success) return name;

    const token = this.peek();
    if (token.type !== "KEYWORD" || token.keyword === undefined || !isColumnType(token.keyword)) {
      return err(unexpectedToken(token, "Expected data type (INT, FLOAT, TEXT)"));
    }
    this.advance();

    return ok({ name: name.data.name, dataType: token.keyword, position: name.data.position });
  }

  // CREATE USER name IDENTIFIED BY 'password' ;
  private parseCreateUser(keyword: Token): ParseStep<CreateUserStatement> {
    const username = this.parseName("Expected user name after 'USER'");
    if (!username.success) return username;

    const identified = this.consume("KEYWORD", "Expected 'IDENTIFIED' after user name", "IDENTIFIED");
    if (!identified.success) return identified;

    const by = this.consume("KEYWORD", "Expected 'BY' after 'IDENTIFIED'", "BY");
    if (!by.success) return by;

    const password = this.consume("STRING", "Expected password string after 'IDENTIFIED BY'");
    if (!password.success) return password;

    const end = this.consume("SEMICOLON", "Expected ';' after CREATE USER statement");
    if (!end.success) return end;

    return ok({
      type: "CREATE_USER",
      username: username.data,
      password: password.data.value.slice(1, -1),
      line: keyword.line,
      column: keyword.column,
    });
  }

  // GRANT privilege ON table TO user ;
  private parseGrant(): ParseStep<GrantStatement> {
    const keyword = this.advance();

    const token = this.peek();
    if (token.type !== "KEYWORD" || token.keyword === undefined || !isPrivilege(token.keyword)) {
      return err(
        unexpectedToken(token, "Expected privilege (SELECT, INSERT, UPDATE, DELETE) after 'GRANT'"),
      );
    }
    this.advance();
    const privilege = token.keyword;

    const on = this.consume("KEYWORD", "Expected 'ON' after privilege", "ON");
    if (!on.success) return on;

    const table = this.parseName("Expected table name after 'ON'");
    if (!table.success) return table;

    const to = this.consume("KEYWORD", "Expected 'TO' after table name", "TO");
    if (!to.success) return to;

    const user = this.parseName("Expected user name after 'TO'");
    if (!user.success) return user;

    const end = this.consume("SEMICOLON", "Expected ';' after GRANT statement");
    if (!end.success) return end;

    return ok({
      type: "GRANT",
      privilege,
      table: table.data,
      user: user.data,
      line: keyword.line,
      column: keyword.column,
    });
  }

  // INSERT INTO table VALUES ( literal {, literal} ) ;
  private parseInsert(): ParseStep<InsertStatement> {
    const keyword = this.advance();

    const into = this.consume("KEYWORD", "Expected 'INTO' after 'INSERT'", "INTO");
    if (!into.success) return into;

    const table = this.parseName("Expected table name after 'INTO'");
    if (!table.success) return table;

    const values = this.consume("KEYWORD", "Expected 'VALUES' after table name", "VALUES");
    if (!values.success) return values;

    const open = this.consume("LPAREN", "Expected '(' after 'VALUES'");
    if (!open.success) return open;

    const literals: LiteralToken[] = [];
    do {
      const literal = this.parseLiteral("Expected a value (number or string)");
      if (!literal.success) return literal;
      literals.push(literal.data);
    } while (this.match("COMMA"));

    const close = this.consume("RPAREN", "Expected ')' after value list");
    if (!close.success) return close;

    const end = this.consume("SEMICOLON", "Expected ';' after INSERT statement");
    if (!end.success) return end;

    return ok({
      type: "INSERT",
      table: table.data,
      values: literals,
      line: keyword.line,
      column: keyword.column,
    });
  }

  // SELECT ( * | column {, column} ) FROM table [WHERE condition] ;
  private parseSelect(): ParseStep<SelectStatement> {
    const keyword = this.advance();

    const columns = this.parseSelectColumns();
    if (!columns.success) return columns;

    const from = this.consume("KEYWORD", "Expected 'FROM' after select list", "FROM");
    if (!from.success) return from;

    const table = this.parseName("Expected table name after 'FROM'");
    if (!table.success) return table;

    const where = this.parseOptionalWhere();
    if (!where.success) return where;

    const end = this.consume("SEMICOLON", "Expected ';' after SELECT statement");
    if (!end.success) return end;

    return ok({
      type: "SELECT",
      table: table.data,
      columns: columns.data,
      where: where.data,
      line: keyword.line,
      column: keyword.column,
    });
  }

  private parseSelectColumns(): ParseStep<SelectColumn[]> {
    if (this.match("STAR")) {
      return ok([{ type: "STAR" }]);
    }

    const columns: SelectColumn[] = [];
    let expectation = "Expected column name or '*' in select list";
    do {
      const name = this.parseName(expectation);
      if (!name.success) return name;
      columns.push({ type: "COLUMN", name: name.data });
      expectation = "Expected column name after ','";
    } while (this.match("COMMA"));

    return ok(columns);
  }

  // UPDATE table SET column = literal {, column = literal} [WHERE condition] ;
  private parseUpdate(): ParseStep<UpdateStatement> {
    const keyword = this.advance();

    const table = this.parseName("Expected table name after 'UPDATE'");
    if (!table.success) return table;

    const set = this.consume("KEYWORD", "Expected 'SET' after table name", "SET");
    if (!set.success) return set;

    const assignments: Assignment[] = [];
    do {
      const assignment = this.parseAssignment();
      if (!assignment.success) return assignment;
      assignments.push(assignment.data);
    } while (this.match("COMMA"));

    const where = this.parseOptionalWhere();
    if (!where.success) return where;

    const end = this.consume("SEMICOLON", "Expected ';' after UPDATE statement");
    if (!end.success) return end;

    return ok({
      type: "UPDATE",
      table: table.data,
      assignments,
      where: where.data,
      line: keyword.line,
      column: keyword.column,
    });
  }

  private parseAssignment(): ParseStep<Assignment> {
    const column = this.parseName("Expected column name in SET clause");
    if (!column.success) return column;

    const equals = this.consume("OPERATOR", "Expected '=' after column name", "=");
    if (!equals.success) return equals;

    const value = this.parseLiteral("Expected a value (number or string) after '='");
    if (!value.success) return value;

    return ok({ column: column.data, value: value.data });
  }

  // DELETE FROM table [WHERE condition] ;
  private parseDelete(): ParseStep<DeleteStatement> {
    const keyword = this.advance();

    const from = this.consume("KEYWORD", "Expected 'FROM' after 'DELETE'", "FROM");
    if (!from.success) return from;

    const table = this.parseName("Expected table name after 'FROM'");
    if (!table.success) return table;

    const where = this.parseOptionalWhere();
    if (!where.success) return where;

    const end = this.consume("SEMICOLON", "Expected ';' after DELETE statement");
    if (!end.success) return end;

    return ok({
      type: "DELETE",
      table: table.data,
      where: where.data,
      line: keyword.line,
      column: keyword.column,
    });
  }

  private parseOptionalWhere(): ParseStep<Condition | undefined> {
    if (!this.match("KEYWORD", "WHERE")) {
      return ok(undefined);
    }
    return this.parseCondition();
  }

  // Precedence, lowest to highest: OR, AND, NOT

  private parseCondition(): ParseStep<Condition> {
    return this.parseOrCondition();
  }

  private parseOrCondition(): ParseStep<Condition> {
    const first = this.parseAndCondition();
    if (!first.success) return first;

    let left = first.data;
    while (this.match("KEYWORD", "OR")) {
      const right = this.parseAndCondition();
      if (!right.success) return right;
      left = { type: "OR", left, right: right.data };
    }

    return ok(left);
  }

  private parseAndCondition(): ParseStep<Condition> {
    const first = this.parseNotCondition();
    if (!first.success) return first;

    let left = first.data;
    while (this.match("KEYWORD", "AND")) {
      const right = this.parseNotCondition();
      if (!right.success) return right;
      left = { type: "AND", left, right: right.data };
    }

    return ok(left);
  }

  private parseNotCondition(): ParseStep<Condition> {
    if (this.match("KEYWORD", "NOT")) {
      const operand = this.parsePrimaryCondition();
      if (!operand.success) return operand;
      return ok({ type: "NOT", operand: operand.data });
    }

    return this.parsePrimaryCondition();
  }

  private parsePrimaryCondition(): ParseStep<Condition> {
    if (this.match("LPAREN")) {
      const condition = this.parseCondition();
      if (!condition.success) return condition;

      const close = this.consume("RPAREN", "Expected ')' after condition");
      if (!close.success) return close;

      return condition;
    }

    return this.parseComparison();
  }

  private parseComparison(): ParseStep<Condition> {
    const column = this.parseName("Expected column name in condition");
    if (!column.success) return column;

    const token = this.peek();
    const operator = token.type === "OPERATOR" ? COMPARISON_OPERATORS.get(token.value) : undefined;
    if (operator === undefined) {
      return err(unexpectedToken(token, "Expected comparison operator (=, !=, <, <=, >, >=)"));
    }
    this.advance();

    const value = this.parseLiteral("Expected a value (number or string) after comparison operator");
    if (!value.success) return value;

    return ok({ type: "COMPARISON", column: column.data, operator, value: value.data });
  }

  private parseName(expectation: string): ParseStep<Name> {
    const token = this.consume("IDENTIFIER", expectation);
    if (!token.success) return token;

    const { value, line, column } = token.data;
    return ok({ name: value, position: { line, column } });
  }

  private parseLiteral(expectation: string): ParseStep<LiteralToken> {
    const token = this.peek();
    if (!isLiteralToken(token)) {
      return err(unexpectedToken(token, expectation));
    }
    this.advance();
    return ok(token);
  }

  /**
   * Panic-mode recovery: drop at least one token, then keep dropping until a
   * statement terminator has been consumed or a statement keyword is next.
   */
  private synchronize(): void {
    this.advance();

    while (!this.isAtEnd()) {
      if (this.previous().type === "SEMICOLON") return;

      const next = this.peek();
      if (next.type === "KEYWORD" && next.keyword !== undefined && STATEMENT_KEYWORDS.has(next.keyword)) {
        return;
      }

      this.advance();
    }
  }

  private check(type: TokenType, value?: Keyword | string): boolean {
    const token = this.peek();
    if (token.type !== type) return false;
    if (value !== undefined && (token.keyword ?? token.value) !== value) return false;
    return true;
  }

  private match(type: TokenType, value?: Keyword | string): boolean {
    if (this.check(type, value)) {
      this.advance();
      return true;
    }
    return false;
  }

  private consume(type: TokenType, expectation: string, value?: Keyword | string): ParseStep<Token> {
    if (this.check(type, value)) return ok(this.advance());
    return err(unexpectedToken(this.peek(), expectation));
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === "EOF";
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}

/**
 * Drop ILLEGAL tokens (the lexer has already reported them) and make sure the
 * stream ends in exactly one EOF token.
 */
function normalizeTokens(tokens: Token[]): Token[] {
  const result: Token[] = [];

  for (const token of tokens) {
    if (token.type === "ILLEGAL") continue;
    result.push(token);
    if (token.type === "EOF") return result;
  }

  const last = result[result.length - 1];
  result.push({
    type: "EOF",
    value: "",
    line: last ? last.line : 1,
    column: last ? last.column + last.value.length : 1,
  });
  return result;
}

/**
 * Parse a token stream in one call
 */
export function parse(tokens: Token[], options?: ParserOptions): ParseOutput {
  return new Parser(tokens, options).parse();
}
