import { diagnosticAt, formatDiagnostic, type Diagnostic } from "./diagnostics";
import { createLogger, type Logger } from "./logger";
import type { KeywordCase, LexicalErrorPolicy } from "./options";
import { isKeyword, type Keyword, type Token, type TokenType } from "./types";

export type LexerOptions = {
  lexicalErrors?: LexicalErrorPolicy;
  keywordCase?: KeywordCase;
  logger?: Logger;
};

export type LexResult = {
  /** Always terminated by a single EOF token */
  tokens: Token[];
  errors: Diagnostic[];
};

export class Lexer {
  private input: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];
  private errors: Diagnostic[] = [];
  private aborted: boolean = false;
  private policy: LexicalErrorPolicy;
  private keywordCase: KeywordCase;
  private logger: Logger;

  constructor(input: string, options: LexerOptions = {}) {
    this.input = input;
    this.policy = options.lexicalErrors ?? "recover";
    this.keywordCase = options.keywordCase ?? "sensitive";
    this.logger = options.logger ?? createLogger({ level: "silent", context: "Lexer" });
  }

  tokenize(): LexResult {
    this.position = 0;
    this.line = 1;
    this.column = 1;
    this.tokens = [];
    this.errors = [];
    this.aborted = false;

    while (!this.aborted && !this.isAtEnd()) {
      this.scanToken();
    }

    this.addToken("EOF", "", this.line, this.column);
    this.logger.debug(`Produced ${this.tokens.length} tokens, ${this.errors.length} error(s)`);
    return { tokens: this.tokens, errors: this.errors };
  }

  private scanToken(): void {
    const line = this.line;
    const column = this.column;
    const char = this.advance();

    switch (char) {
      case "(":
        this.addToken("LPAREN", char, line, column);
        return;
      case ")":
        this.addToken("RPAREN", char, line, column);
        return;
      case ",":
        this.addToken("COMMA", char, line, column);
        return;
      case ";":
        this.addToken("SEMICOLON", char, line, column);
        return;
      case "*":
        this.addToken("STAR", char, line, column);
        return;
      case "=":
      case "+":
      case "/":
        this.addToken("OPERATOR", char, line, column);
        return;
      case "!":
        if (this.peek() === "=") {
          this.advance();
          this.addToken("OPERATOR", "!=", line, column);
        } else {
          this.illegal(char, line, column);
        }
        return;
      case "<":
        if (this.peek() === "=" || this.peek() === ">") {
          this.addToken("OPERATOR", char + this.advance(), line, column);
        } else {
          this.addToken("OPERATOR", char, line, column);
        }
        return;
      case ">":
        if (this.peek() === "=") {
          this.addToken("OPERATOR", char + this.advance(), line, column);
        } else {
          this.addToken("OPERATOR", char, line, column);
        }
        return;
      case "-":
        if (this.peek() === "-") {
          this.skipLineComment();
        } else {
          this.addToken("OPERATOR", char, line, column);
        }
        return;
      case "#":
        if (this.peek() === "#") {
          this.skipBlockComment(line, column);
        } else {
          this.illegal(char, line, column);
        }
        return;
      case "'":
        this.tokenizeString(line, column);
        return;
    }

    if (this.isWhitespace(char)) return;

    if (this.isDigit(char)) {
      this.tokenizeNumber(char, line, column);
    } else if (this.isAlpha(char)) {
      this.tokenizeIdentifierOrKeyword(char, line, column);
    } else {
      this.illegal(char, line, column);
    }
  }

  // One code point per call; a surrogate pair counts as a single column
  private advance(): string {
    const char = this.peek();
    this.position += char.length;

    if (char === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }

    return char;
  }

  private peek(): string {
    const codePoint = this.input.codePointAt(this.position);
    return codePoint === undefined ? "" : String.fromCodePoint(codePoint);
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private isWhitespace(char: string): boolean {
    return /\s/.test(char);
  }

  private isDigit(char: string): boolean {
    return /^[0-9]$/.test(char);
  }

  private isAlpha(char: string): boolean {
    return /^\p{L}$/u.test(char);
  }

  private isAlphaNumeric(char: string): boolean {
    return /^[\p{L}\p{N}_]$/u.test(char);
  }

  private skipLineComment(): void {
    while (!this.isAtEnd() && this.peek() !== "\n") {
      this.advance();
    }
  }

  private skipBlockComment(line: number, column: number): void {
    this.advance(); // second '#'

    while (!this.isAtEnd()) {
      if (this.advance() === "#" && this.peek() === "#") {
        this.advance();
        return;
      }
    }

    this.reportError("Unterminated multi-line comment", line, column);
  }

  private tokenizeString(line: number, column: number): void {
    const start = this.position - 1;

    while (!this.isAtEnd() && this.peek() !== "'") {
      this.advance();
    }

    if (this.isAtEnd()) {
      this.reportError("Unclosed string literal", line, column);
      if (!this.aborted) {
        this.addToken("ILLEGAL", this.input.slice(start), line, column);
      }
      return;
    }

    this.advance(); // closing quote
    this.addToken("STRING", this.input.slice(start, this.position), line, column);
  }

  private tokenizeNumber(first: string, line: number, column: number): void {
    let value = first;

    while (this.isDigit(this.peek())) {
      value += this.advance();
    }

    if (this.peek() === ".") {
      value += this.advance();
      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    this.addToken("NUMBER", value, line, column);
  }

  private tokenizeIdentifierOrKeyword(first: string, line: number, column: number): void {
    let value = first;

    while (this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    const candidate = this.keywordCase === "insensitive" ? value.toUpperCase() : value;
    if (isKeyword(candidate)) {
      this.addToken("KEYWORD", value, line, column, candidate);
    } else {
      this.addToken("IDENTIFIER", value, line, column);
    }
  }

  private illegal(char: string, line: number, column: number): void {
    this.reportError(`Invalid character '${char}'`, line, column);
    if (!this.aborted) {
      this.addToken("ILLEGAL", char, line, column);
    }
  }

  private reportError(message: string, line: number, column: number): void {
    const diagnostic = diagnosticAt("lexical", message, { line, column });
    this.errors.push(diagnostic);
    this.logger.warn(formatDiagnostic(diagnostic));

    if (this.policy === "abort") {
      this.aborted = true;
    }
  }

  private addToken(
    type: TokenType,
    value: string,
    line: number,
    column: number,
    keyword?: Keyword,
  ): void {
    const token: Token = keyword ? { type, value, line, column, keyword } : { type, value, line, column };
    this.tokens.push(Object.freeze(token));
  }
}

/**
 * Tokenize source text in one call
 */
export function tokenize(input: string, options?: LexerOptions): LexResult {
  return new Lexer(input, options).tokenize();
}
