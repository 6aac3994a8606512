/**
 * Hack Assembler Lexer
 *
 * Tokenizes Hack assembly source code into tokens for parsing.
 */

export enum TokenType {
  // Symbols, register names and jump mnemonics share one token type;
  // the parser tells them apart by position.
  IDENTIFIER = 'IDENTIFIER',
  NUMBER = 'NUMBER',

  // Punctuation
  AT = 'AT',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  EQUALS = 'EQUALS',
  SEMICOLON = 'SEMICOLON',

  // Operators
  BANG = 'BANG',
  PLUS = 'PLUS',
  MINUS = 'MINUS',
  PIPE = 'PIPE',
  AMPERSAND = 'AMPERSAND',

  NEWLINE = 'NEWLINE',

  // End of file
  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
  offset: number;
}

const PUNCTUATION: Record<string, TokenType> = {
  '@': TokenType.AT,
  '(': TokenType.LPAREN,
  ')': TokenType.RPAREN,
  '=': TokenType.EQUALS,
  ';': TokenType.SEMICOLON,
  '!': TokenType.BANG,
  '+': TokenType.PLUS,
  '-': TokenType.MINUS,
  '|': TokenType.PIPE,
  '&': TokenType.AMPERSAND,
};

// Non-alphanumeric characters allowed anywhere in a symbol
const SYMBOL_CHARS = '._$%#';

function describeExpected(expected: readonly string[]): string {
  if (expected.length <= 1) {
    return expected[0] ?? 'valid input';
  }
  return `${expected.slice(0, -1).join(', ')} or ${expected[expected.length - 1]}`;
}

/**
 * The only error the parser raises. Positions are 1-based for line and
 * column, 0-based for offset.
 */
export class HackSyntaxError extends Error {
  constructor(
    public expected: string[],
    public found: string,
    public line: number,
    public column: number,
    public offset: number
  ) {
    super(`Expected ${describeExpected(expected)}, got ${found} at line ${line}, column ${column}`);
    this.name = 'HackSyntaxError';
  }
}

export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of input';
    case TokenType.NEWLINE:
      return 'end of line';
    default:
      return `'${token.value}'`;
  }
}

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    const tokens: Token[] = [];
    let token: Token;
    do {
      token = this.nextToken();
      tokens.push(token);
    } while (token.type !== TokenType.EOF);

    return tokens;
  }

  /**
   * Scans only as far as the next token, so a bad character is not
   * reported before the parser has seen everything ahead of it.
   * Keeps returning EOF once the source is exhausted.
   */
  nextToken(): Token {
    while (!this.isAtEnd()) {
      const token = this.scanToken();
      if (token) {
        return token;
      }
    }

    return {
      type: TokenType.EOF,
      value: '',
      line: this.line,
      column: this.column,
      offset: this.pos,
    };
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  // Columns count code points; offsets stay UTF-16 indices into the source
  private advance(): string {
    const char = String.fromCodePoint(this.source.codePointAt(this.pos) ?? 0);
    this.pos += char.length;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private scanToken(): Token | undefined {
    const startLine = this.line;
    const startColumn = this.column;
    const startOffset = this.pos;
    const char = this.advance();
    const token = (type: TokenType, value: string): Token => ({
      type,
      value,
      line: startLine,
      column: startColumn,
      offset: startOffset,
    });

    switch (char) {
      case ' ':
      case '\t':
      case '\r':
        // Skip whitespace
        return undefined;

      case '\n':
        return token(TokenType.NEWLINE, '\n');

      case '/':
        if (this.peek() !== '/') {
          throw new HackSyntaxError(["'//'"], "'/'", startLine, startColumn, startOffset);
        }
        // Skip comment until end of line
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
        return undefined;

      default:
        if (char in PUNCTUATION) {
          return token(PUNCTUATION[char], char);
        }
        if (this.isDigit(char)) {
          return token(TokenType.NUMBER, this.scanWhile(char, c => this.isDigit(c)));
        }
        if (this.isSymbolStart(char)) {
          // Case is kept; registers and mnemonics are matched case-insensitively by the parser
          return token(TokenType.IDENTIFIER, this.scanWhile(char, c => this.isSymbolChar(c)));
        }
        throw new HackSyntaxError(['token'], `'${char}'`, startLine, startColumn, startOffset);
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private isSymbolStart(char: string): boolean {
    return this.isAlpha(char) || SYMBOL_CHARS.includes(char);
  }

  private isSymbolChar(char: string): boolean {
    return this.isSymbolStart(char) || this.isDigit(char);
  }

  private scanWhile(first: string, accept: (char: string) => boolean): string {
    let text = first;
    while (!this.isAtEnd() && accept(this.peek())) {
      text += this.advance();
    }
    return text;
  }
}
