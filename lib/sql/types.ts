// SQL token and AST types

export type TokenType =
  | "KEYWORD"
  | "IDENTIFIER"
  | "NUMBER"
  | "STRING"
  | "OPERATOR"
  | "STAR"
  | "COMMA"
  | "SEMICOLON"
  | "LPAREN"
  | "RPAREN"
  | "ILLEGAL"
  | "EOF";

export const KEYWORDS = [
  "SELECT",
  "FROM",
  "WHERE",
  "INSERT",
  "INTO",
  "VALUES",
  "UPDATE",
  "SET",
  "DELETE",
  "CREATE",
  "TABLE",
  "AND",
  "OR",
  "NOT",
  "USER",
  "IDENTIFIED",
  "BY",
  "GRANT",
  "ON",
  "TO",
  "INT",
  "FLOAT",
  "TEXT",
] as const;

export type Keyword = (typeof KEYWORDS)[number];

export type Token = {
  type: TokenType;
  /** Exact source text of the token */
  value: string;
  line: number;
  column: number;
  /** Upper-case keyword, set only on KEYWORD tokens */
  keyword?: Keyword;
};

export type LiteralToken = Token & { type: "NUMBER" | "STRING" };

export type Position = {
  line: number;
  column: number;
};

export type Name = {
  name: string;
  position: Position;
};

export const COLUMN_TYPES = ["INT", "FLOAT", "TEXT"] as const;
export type ColumnType = (typeof COLUMN_TYPES)[number];

export const PRIVILEGES = ["SELECT", "INSERT", "UPDATE", "DELETE"] as const;
export type Privilege = (typeof PRIVILEGES)[number];

export type ComparisonOperator = "=" | "!=" | "<" | "<=" | ">" | ">=";

export type ColumnDefinition = {
  name: string;
  dataType: ColumnType;
  position: Position;
};

export type Assignment = {
  column: Name;
  value: LiteralToken;
};

export type SelectColumn = { type: "STAR" } | { type: "COLUMN"; name: Name };

export type ComparisonCondition = {
  type: "COMPARISON";
  column: Name;
  operator: ComparisonOperator;
  value: LiteralToken;
  /** Declared type of the column, filled in by the analyzer */
  columnType?: ColumnType;
};

export type Condition =
  | ComparisonCondition
  | { type: "AND"; left: Condition; right: Condition }
  | { type: "OR"; left: Condition; right: Condition }
  | { type: "NOT"; operand: Condition };

export type CreateTableStatement = {
  type: "CREATE_TABLE";
  table: Name;
  columns: ColumnDefinition[];
} & Position;

export type InsertStatement = {
  type: "INSERT";
  table: Name;
  values: LiteralToken[];
} & Position;

export type SelectStatement = {
  type: "SELECT";
  table: Name;
  columns: SelectColumn[];
  where?: Condition;
} & Position;

export type UpdateStatement = {
  type: "UPDATE";
  table: Name;
  assignments: Assignment[];
  where?: Condition;
} & Position;

export type DeleteStatement = {
  type: "DELETE";
  table: Name;
  where?: Condition;
} & Position;

export type CreateUserStatement = {
  type: "CREATE_USER";
  username: Name;
  /** Password text without the surrounding quotes */
  password: string;
} & Position;

export type GrantStatement = {
  type: "GRANT";
  privilege: Privilege;
  table: Name;
  user: Name;
} & Position;

export type Statement =
  | CreateTableStatement
  | InsertStatement
  | SelectStatement
  | UpdateStatement
  | DeleteStatement
  | CreateUserStatement
  | GrantStatement;

export type StatementType = Statement["type"];

/**
 * Outcome of a step that can fail without throwing.
 * Mirrors the `{ success, data } | { success, error }` shape returned to callers.
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function err<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export function isLiteralToken(token: Token): token is LiteralToken {
  return token.type === "NUMBER" || token.type === "STRING";
}

export function isColumnType(value: string): value is ColumnType {
  return COLUMN_TYPES.some((type) => type === value);
}

export function isPrivilege(value: string): value is Privilege {
  return PRIVILEGES.some((privilege) => privilege === value);
}

export function isKeyword(value: string): value is Keyword {
  return KEYWORDS.some((keyword) => keyword === value);
}
