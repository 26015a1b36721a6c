import { describe, it, expect } from "vitest";
import { UnsupportedExpressionError } from "../src/hashing/errors.js";
import { evaluate, evaluateExpression, parseExpression } from "../src/hashing/expression.js";
import { NumericOverflowError } from "../src/utils/uint.js";

function unsupported(text: string): { token: string; position: number } {
  try {
    evaluate(text);
  } catch (err) {
    if (err instanceof UnsupportedExpressionError) {
      return { token: err.token, position: err.position };
    }
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(text)} to be rejected`);
}

describe("parseExpression", () => {
  it("builds a literal node", () => {
    expect(parseExpression("65536")).toEqual({ kind: "integer", value: 65536 });
  });

  it("keeps parentheses as their own node", () => {
    expect(parseExpression("(1+2)*3")).toEqual({
      kind: "binary",
      op: "*",
      position: 5,
      left: {
        kind: "paren",
        inner: {
          kind: "binary",
          op: "+",
          position: 2,
          left: { kind: "integer", value: 1 },
          right: { kind: "integer", value: 2 },
        },
      },
      right: { kind: "integer", value: 3 },
    });
  });

  it("binds * tighter than +", () => {
    expect(parseExpression("1+2*3")).toEqual({
      kind: "binary",
      op: "+",
      position: 1,
      left: { kind: "integer", value: 1 },
      right: {
        kind: "binary",
        op: "*",
        position: 3,
        left: { kind: "integer", value: 2 },
        right: { kind: "integer", value: 3 },
      },
    });
  });
});

describe("evaluate", () => {
  it("evaluates plain literals", () => {
    expect(evaluate("65546")).toBe(65546);
    expect(evaluate("0")).toBe(0);
    expect(evaluate("007")).toBe(7);
    expect(evaluate("4294967295")).toBe(4294967295);
  });

  it("evaluates a kibibyte product", () => {
    expect(evaluate("64*1024")).toBe(65536);
  });

  it("evaluates nested parentheses", () => {
    expect(evaluate("((64*1024)+(20-10))/2")).toBe(32773);
  });

  it("allows whitespace between tokens", () => {
    expect(evaluate("( ( 64 * 1024 ) + ( 20 - 10 ) ) / 2")).toBe(32773);
    expect(evaluate("\t64\n*\n1024 ")).toBe(65536);
  });

  it("applies precedence and left associativity", () => {
    expect(evaluate("2+3*4")).toBe(14);
    expect(evaluate("(2+3)*4")).toBe(20);
    expect(evaluate("10-4-3")).toBe(3);
    expect(evaluate("100/10/5")).toBe(2);
    expect(evaluate("8/2*4")).toBe(16);
  });

  it("truncates division", () => {
    expect(evaluate("7/2")).toBe(3);
    expect(evaluate("1/3")).toBe(0);
  });

  it("wraps subtraction below zero", () => {
    expect(evaluate("5-10")).toBe(4294967291);
    expect(evaluate("0-1")).toBe(4294967295);
  });

  it("wraps addition and multiplication past 32 bits", () => {
    expect(evaluate("4294967295+1")).toBe(0);
    expect(evaluate("65536*65536")).toBe(0);
    expect(evaluate("4294967295*2")).toBe(4294967294);
  });

  it("evaluates a hand-built tree", () => {
    expect(
      evaluateExpression({
        kind: "binary",
        op: "-",
        position: 0,
        left: { kind: "paren", inner: { kind: "integer", value: 9 } },
        right: { kind: "integer", value: 4 },
      }),
    ).toBe(5);
  });
});

describe("evaluate rejections", () => {
  it("rejects an unsupported operator before looking at the parentheses", () => {
    expect(unsupported("(64%1024)+(20-10))/2")).toEqual({ token: "%", position: 3 });
  });

  it("rejects unary minus", () => {
    expect(unsupported("(64*-1024)")).toEqual({ token: "-", position: 4 });
    expect(unsupported("+1")).toEqual({ token: "+", position: 0 });
  });

  it("rejects floating point literals", () => {
    expect(unsupported("3.14159")).toEqual({ token: "3.14159", position: 0 });
    expect(unsupported("((64*(3.14159))+(20-10))/2")).toEqual({ token: "3.14159", position: 6 });
  });

  it("rejects other bases, exponents and identifiers", () => {
    expect(unsupported("0x10")).toEqual({ token: "0x10", position: 0 });
    expect(unsupported("1e3")).toEqual({ token: "1e3", position: 0 });
    expect(unsupported("64*kib")).toEqual({ token: "kib", position: 3 });
  });

  it("rejects unbalanced parentheses", () => {
    expect(unsupported("(1+2")).toEqual({ token: "end of expression", position: 4 });
    expect(unsupported("1+2)")).toEqual({ token: ")", position: 3 });
  });

  it("rejects trailing tokens and missing operands", () => {
    expect(unsupported("1 2")).toEqual({ token: "2", position: 2 });
    expect(unsupported("1+")).toEqual({ token: "end of expression", position: 2 });
    expect(unsupported("()")).toEqual({ token: ")", position: 1 });
  });

  it("rejects an empty expression", () => {
    expect(unsupported("")).toEqual({ token: "end of expression", position: 0 });
    expect(unsupported("   ")).toEqual({ token: "end of expression", position: 3 });
  });

  it("rejects division by zero", () => {
    expect(unsupported("10/0")).toEqual({ token: "/ 0", position: 2 });
    expect(unsupported("1/(2-2)")).toEqual({ token: "/ 0", position: 1 });
  });

  it("reports literals above 32 bits as NumericOverflowError", () => {
    expect(() => evaluate("4294967300")).toThrow(NumericOverflowError);
    expect(() => evaluate("((64*4294967300)+(20-10))/2")).toThrow(NumericOverflowError);
  });
});
