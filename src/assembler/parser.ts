/**
 * Hack Assembler Parser
 *
 * Parses tokens into instruction nodes. Each rule is tried as an ordered
 * choice: the first alternative that matches wins, and a failed alternative
 * rewinds to where it started.
 */

import { HackSyntaxError, Lexer, Token, TokenType, describeToken } from './lexer.js';

export enum NodeType {
  LABEL = 'LABEL',
  AT_INSTRUCTION = 'AT_INSTRUCTION',
  C_INSTRUCTION = 'C_INSTRUCTION',
}

export type Register = 'A' | 'D' | 'M';

export type Jump = 'JMP' | 'JGT' | 'JEQ' | 'JLT' | 'JGE' | 'JLE' | 'JNE';

export type BinaryOp = '+' | '|' | '-' | '&';

// Parsed values are frozen; the readonly fields say so to the compiler
export type Computation =
  | { readonly kind: 'constant'; readonly value: 0 | 1 | -1 }
  | { readonly kind: 'unary'; readonly position: 'prefix'; readonly op: '!' | '-'; readonly operand: Register }
  | { readonly kind: 'unary'; readonly position: 'postfix'; readonly op: '+1' | '-1'; readonly operand: Register }
  | { readonly kind: 'binary'; readonly left: Register; readonly op: BinaryOp; readonly right: Register }
  | { readonly kind: 'register'; readonly register: Register };

export type AtOperand =
  | { readonly kind: 'literal'; readonly digits: string; readonly value: number }
  | { readonly kind: 'symbol'; readonly name: string };

export interface LabelNode {
  readonly type: NodeType.LABEL;
  readonly name: string;
  readonly line: number;
  readonly column: number;
}

export interface AtInstructionNode {
  readonly type: NodeType.AT_INSTRUCTION;
  readonly operand: AtOperand;
  readonly line: number;
  readonly column: number;
}

export interface CInstructionNode {
  readonly type: NodeType.C_INSTRUCTION;
  readonly dest: readonly Register[];
  readonly comp: Computation;
  readonly jump?: Jump;
  readonly line: number;
  readonly column: number;
}

export type InstructionNode = LabelNode | AtInstructionNode | CInstructionNode;

export interface Program {
  readonly instructions: readonly InstructionNode[];
}

export type ParseResult =
  | { ok: true; program: Program }
  | { ok: false; error: HackSyntaxError };

const REGISTERS: Record<string, Register> = {
  A: 'A',
  D: 'D',
  M: 'M',
};

const JUMPS: Record<string, Jump> = {
  JMP: 'JMP',
  JGT: 'JGT',
  JEQ: 'JEQ',
  JLT: 'JLT',
  JGE: 'JGE',
  JLE: 'JLE',
  JNE: 'JNE',
};

const BINARY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TokenType.PLUS]: '+',
  [TokenType.PIPE]: '|',
  [TokenType.MINUS]: '-',
  [TokenType.AMPERSAND]: '&',
};

const MAX_DEST_REGISTERS = 3;

// Case-insensitive keyword lookups; the token keeps its original spelling
export function toRegister(text: string): Register | undefined {
  return REGISTERS[text.toUpperCase()];
}

export function toJump(text: string): Jump | undefined {
  return JUMPS[text.toUpperCase()];
}

interface Failure {
  pos: number;
  expected: string[];
}

export class Parser {
  // Filled on demand, so lexing never runs ahead of the line being parsed
  private tokens: Token[] = [];
  private pos: number = 0;
  private source: string;
  private lexer: Lexer;
  // Furthest position any alternative failed at on the current line
  private failure: Failure = { pos: -1, expected: [] };

  private readonly computationRules: ReadonlyArray<() => Computation | undefined> = [
    () => this.parseConstant(),
    () => this.parsePrefixUnary(),
    () => this.parsePostfixUnary(),
    () => this.parseBinary(),
    () => this.parseRegisterComputation(),
  ];

  constructor(source: string) {
    this.source = source;
    this.lexer = new Lexer(source);
  }

  parse(): Program {
    this.lexer = new Lexer(this.source);
    this.tokens = [];
    this.pos = 0;

    const instructions: InstructionNode[] = [];

    while (!this.isAtEnd()) {
      // Blank and comment-only lines
      if (this.match(TokenType.NEWLINE)) continue;

      this.failure = { pos: -1, expected: [] };
      const node = this.parseInstruction();
      instructions.push(node);

      const canTakeJump = node.type === NodeType.C_INSTRUCTION && node.jump === undefined;
      this.expectEndOfLine(canTakeJump ? ["';'"] : []);
    }

    return { instructions: Object.freeze(instructions) };
  }

  private parseInstruction(): InstructionNode {
    const token = this.peek();

    if (token.type === TokenType.LPAREN) {
      return Object.freeze(this.parseLabel());
    }

    if (token.type === TokenType.AT) {
      return Object.freeze(this.parseAtInstruction());
    }

    return Object.freeze(this.parseCInstruction());
  }

  private parseLabel(): LabelNode {
    const token = this.advance();
    const name = this.expect(TokenType.IDENTIFIER, 'symbol').value;
    this.expect(TokenType.RPAREN, "')'");

    return {
      type: NodeType.LABEL,
      name,
      line: token.line,
      column: token.column,
    };
  }

  private parseAtInstruction(): AtInstructionNode {
    const token = this.advance();
    const operandToken = this.peek();
    let operand: AtOperand;

    // Literal first: an all-digit operand never reads as a symbol
    if (operandToken.type === TokenType.NUMBER) {
      operand = { kind: 'literal', digits: operandToken.value, value: Number(operandToken.value) };
    } else if (operandToken.type === TokenType.IDENTIFIER) {
      operand = { kind: 'symbol', name: operandToken.value };
    } else {
      throw this.error(['literal', 'symbol']);
    }
    this.advance();

    return {
      type: NodeType.AT_INSTRUCTION,
      operand: Object.freeze(operand),
      line: token.line,
      column: token.column,
    };
  }

  private parseCInstruction(): CInstructionNode {
    const token = this.peek();
    const dest = this.parseDestination();
    const comp = this.parseComputation();
    const jump = this.match(TokenType.SEMICOLON) ? this.parseJump() : undefined;

    return {
      type: NodeType.C_INSTRUCTION,
      dest,
      comp,
      ...(jump !== undefined ? { jump } : {}),
      line: token.line,
      column: token.column,
    };
  }

  private parseDestination(): readonly Register[] {
    const token = this.peek();
    if (token.type !== TokenType.IDENTIFIER || this.peekNext().type !== TokenType.EQUALS) {
      return Object.freeze([]);
    }

    const dest: Register[] = [];
    for (const char of token.value) {
      const register = toRegister(char);
      if (register === undefined || dest.length === MAX_DEST_REGISTERS) {
        throw this.error(['destination']);
      }
      dest.push(register);
    }

    this.advance(); // registers
    this.advance(); // '='
    return Object.freeze(dest);
  }

  private parseComputation(): Computation {
    const start = this.pos;

    for (const rule of this.computationRules) {
      const comp = rule();
      if (comp !== undefined) {
        return Object.freeze(comp);
      }
      this.pos = start;
    }

    throw this.error([]);
  }

  private parseConstant(): Computation | undefined {
    const token = this.peek();

    if (token.type === TokenType.NUMBER && (token.value === '0' || token.value === '1')) {
      this.advance();
      return { kind: 'constant', value: token.value === '0' ? 0 : 1 };
    }

    if (token.type === TokenType.MINUS && this.isNumberOne(this.peekNext())) {
      this.advance();
      this.advance();
      return { kind: 'constant', value: -1 };
    }

    return this.fail(['constant']);
  }

  private parsePrefixUnary(): Computation | undefined {
    const token = this.peek();
    if (token.type !== TokenType.BANG && token.type !== TokenType.MINUS) {
      return this.fail(['unary operator']);
    }
    this.advance();

    const operand = this.parseRegister();
    if (operand === undefined) return undefined;

    const op = token.type === TokenType.BANG ? '!' : '-';
    return { kind: 'unary', position: 'prefix', op, operand };
  }

  private parsePostfixUnary(): Computation | undefined {
    const operand = this.parseRegister();
    if (operand === undefined) return undefined;

    const opToken = this.peek();
    if (opToken.type !== TokenType.PLUS && opToken.type !== TokenType.MINUS) {
      return this.fail(["'+1'", "'-1'"]);
    }
    this.advance();

    if (!this.isNumberOne(this.peek())) {
      return this.fail(["'1'"]);
    }
    this.advance();

    const op = opToken.type === TokenType.PLUS ? '+1' : '-1';
    return { kind: 'unary', position: 'postfix', op, operand };
  }

  private parseBinary(): Computation | undefined {
    const left = this.parseRegister();
    if (left === undefined) return undefined;

    const op = BINARY_OPS[this.peek().type];
    if (op === undefined) {
      return this.fail(['binary operator']);
    }
    this.advance();

    const right = this.parseRegister();
    if (right === undefined) return undefined;

    return { kind: 'binary', left, op, right };
  }

  private parseRegisterComputation(): Computation | undefined {
    const register = this.parseRegister();
    if (register === undefined) return undefined;
    return { kind: 'register', register };
  }

  private parseRegister(): Register | undefined {
    const token = this.peek();
    const register = token.type === TokenType.IDENTIFIER ? toRegister(token.value) : undefined;
    if (register === undefined) {
      return this.fail(['register']);
    }
    this.advance();
    return register;
  }

  private parseJump(): Jump {
    const token = this.peek();
    const jump = token.type === TokenType.IDENTIFIER ? toJump(token.value) : undefined;
    if (jump === undefined) {
      throw this.error(['jump mnemonic']);
    }
    this.advance();
    return jump;
  }

  private expectEndOfLine(alternatives: string[]): void {
    if (this.match(TokenType.NEWLINE) || this.check(TokenType.EOF)) {
      return;
    }
    throw this.error([...alternatives, 'end of line']);
  }

  // Helper methods
  private isNumberOne(token: Token): boolean {
    return token.type === TokenType.NUMBER && token.value === '1';
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private tokenAt(index: number): Token {
    while (this.tokens.length <= index) {
      const last = this.tokens[this.tokens.length - 1];
      if (last !== undefined && last.type === TokenType.EOF) {
        return last;
      }
      this.tokens.push(this.lexer.nextToken());
    }
    return this.tokens[index];
  }

  private peek(): Token {
    return this.tokenAt(this.pos);
  }

  private peekNext(): Token {
    return this.tokenAt(this.pos + 1);
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.tokenAt(this.pos - 1);
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, expected: string): Token {
    if (this.check(type)) {
      return this.advance();
    }
    throw this.error([expected]);
  }

  private fail(expected: string[]): undefined {
    if (this.pos > this.failure.pos) {
      this.failure = { pos: this.pos, expected: [...expected] };
    } else if (this.pos === this.failure.pos) {
      for (const name of expected) {
        if (!this.failure.expected.includes(name)) {
          this.failure.expected.push(name);
        }
      }
    }
    return undefined;
  }

  private error(expected: string[]): HackSyntaxError {
    this.fail(expected);
    const token = this.tokenAt(this.failure.pos);
    return new HackSyntaxError(
      this.failure.expected,
      describeToken(token),
      token.line,
      token.column,
      token.offset
    );
  }
}

export function parse(source: string): Program {
  return new Parser(source).parse();
}

export function tryParse(source: string): ParseResult {
  try {
    return { ok: true, program: parse(source) };
  } catch (e) {
    if (e instanceof HackSyntaxError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
