import { parseUnsigned } from "../utils/uint.js";
import { UnsupportedExpressionError } from "./errors.js";

// Memory-cost expressions: unsigned integer literals, + - * /, parentheses.
//
//   sum     := product (("+" | "-") product)*
//   product := primary (("*" | "/") primary)*
//   primary := INTEGER | "(" sum ")"
//
// Evaluation is uint32 arithmetic. Subtraction wraps (5-10 = 4294967291)
// rather than failing; existing settings strings may depend on it.

export type Operator = "+" | "-" | "*" | "/";

export type Expression =
  | { kind: "integer"; value: number }
  | { kind: "binary"; op: Operator; left: Expression; right: Expression; position: number }
  | { kind: "paren"; inner: Expression };

type Token =
  | { type: "integer"; text: string; position: number }
  | { type: "operator"; text: Operator; position: number }
  | { type: "lparen" | "rparen"; text: string; position: number }
  | { type: "end"; text: string; position: number };

const END_OF_EXPRESSION = "end of expression";

function isOperator(ch: string): ch is Operator {
  return ch === "+" || ch === "-" || ch === "*" || ch === "/";
}

// Anything that could start a number in some other notation (3.14, 0x10, 1e3)
// is read as one word so the error names the whole literal.
const WORD_CHAR = /[0-9A-Za-z_.]/;

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (isOperator(ch)) {
      tokens.push({ type: "operator", text: ch, position: i });
      i++;
    } else if (ch === "(") {
      tokens.push({ type: "lparen", text: ch, position: i });
      i++;
    } else if (ch === ")") {
      tokens.push({ type: "rparen", text: ch, position: i });
      i++;
    } else if (WORD_CHAR.test(ch)) {
      const start = i;
      while (i < text.length && WORD_CHAR.test(text[i])) i++;
      const word = text.slice(start, i);
      if (!/^[0-9]+$/.test(word)) {
        throw new UnsupportedExpressionError(word, start);
      }
      tokens.push({ type: "integer", text: word, position: start });
    } else {
      throw new UnsupportedExpressionError(ch, i);
    }
  }
  tokens.push({ type: "end", text: END_OF_EXPRESSION, position: text.length });
  return tokens;
}

class Parser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): Expression {
    const expr = this.parseSum();
    const trailing = this.peek();
    if (trailing.type !== "end") {
      throw new UnsupportedExpressionError(trailing.text, trailing.position);
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    // The end token is never consumed past.
    if (token.type !== "end") this.index++;
    return token;
  }

  private parseSum(): Expression {
    let left = this.parseProduct();
    while (true) {
      const token = this.peek();
      if (token.type !== "operator" || (token.text !== "+" && token.text !== "-")) {
        return left;
      }
      this.next();
      left = { kind: "binary", op: token.text, left, right: this.parseProduct(), position: token.position };
    }
  }

  private parseProduct(): Expression {
    let left = this.parsePrimary();
    while (true) {
      const token = this.peek();
      if (token.type !== "operator" || (token.text !== "*" && token.text !== "/")) {
        return left;
      }
      this.next();
      left = { kind: "binary", op: token.text, left, right: this.parsePrimary(), position: token.position };
    }
  }

  private parsePrimary(): Expression {
    const token = this.next();
    switch (token.type) {
      case "integer":
        return { kind: "integer", value: parseUnsigned(token.text, 32) };
      case "lparen": {
        const inner = this.parseSum();
        const close = this.next();
        if (close.type !== "rparen") {
          throw new UnsupportedExpressionError(close.text, close.position);
        }
        return { kind: "paren", inner };
      }
      default:
        // Unary minus, a missing operand, or a stray ")".
        throw new UnsupportedExpressionError(token.text, token.position);
    }
  }
}

/**
 * Parse a memory expression into its AST.
 *
 * @throws UnsupportedExpressionError on any token or structure outside the grammar
 * @throws NumericOverflowError when a literal exceeds 32 bits
 */
export function parseExpression(text: string): Expression {
  return new Parser(tokenize(text)).parse();
}

function apply(op: Operator, x: number, y: number, position: number): number {
  switch (op) {
    case "+":
      return (x + y) >>> 0;
    case "-":
      return (x - y) >>> 0;
    case "*":
      return Math.imul(x, y) >>> 0;
    case "/":
      if (y === 0) {
        throw new UnsupportedExpressionError("/ 0", position);
      }
      return Math.floor(x / y);
  }
}

export function evaluateExpression(node: Expression): number {
  switch (node.kind) {
    case "integer":
      return node.value;
    case "paren":
      return evaluateExpression(node.inner);
    case "binary":
      return apply(node.op, evaluateExpression(node.left), evaluateExpression(node.right), node.position);
  }
}

/** Parse and evaluate a memory expression to an unsigned 32-bit value. */
export function evaluate(text: string): number {
  return evaluateExpression(parseExpression(text));
}
