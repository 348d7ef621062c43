/**
 * Expression Evaluator
 *
 * Evaluates the arithmetic on the right-hand side of scheme entries.
 * Supports numeric literals, + - * /, unary signs and parentheses.
 * Nothing else is accepted, so scheme files can never run code.
 */

import { Decimal } from "decimal.js";

import { ExpressionError } from "@/lib/errors";

type Token =
  | { type: "number"; value: Decimal; position: number }
  | { type: "operator"; value: "+" | "-" | "*" | "/"; position: number }
  | { type: "paren"; value: "(" | ")"; position: number };

const NUMBER_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)/;
const REFERENCE_PATTERN = /\{([^{}]+)\}/g;

/**
 * Resolves `{id}` references to a numeric value
 */
export type ReferenceResolver = (id: string) => number;

export class ExpressionEvaluator {
  /**
   * Evaluate an expression to a number
   */
  evaluate(expression: string): number {
    return this.evaluateDecimal(expression).toNumber();
  }

  private evaluateDecimal(expression: string): Decimal {
    const tokens = this.tokenize(expression);
    if (tokens.length === 0) {
      throw new ExpressionError(`Empty expression`);
    }

    const parser = new Parser(tokens, expression);
    return parser.parse();
  }

  /**
   * Replace every `{id}` reference with the value the resolver returns.
   * The resolver decides what an unknown id means.
   */
  substituteReferences(expression: string, resolve: ReferenceResolver): string {
    return expression.replace(REFERENCE_PATTERN, (_match, id: string) => {
      const value = resolve(id.trim());
      return `(${new Decimal(value).toFixed()})`;
    });
  }

  /**
   * Substitute references, then evaluate
   */
  evaluateWithReferences(expression: string, resolve: ReferenceResolver): number {
    return this.evaluate(this.substituteReferences(expression, resolve));
  }

  private tokenize(expression: string): Token[] {
    const tokens: Token[] = [];
    let position = 0;

    while (position < expression.length) {
      const char = expression[position];

      if (/\s/.test(char)) {
        position += 1;
        continue;
      }

      if (char === "+" || char === "-" || char === "*" || char === "/") {
        tokens.push({ type: "operator", value: char, position });
        position += 1;
        continue;
      }

      if (char === "(" || char === ")") {
        tokens.push({ type: "paren", value: char, position });
        position += 1;
        continue;
      }

      const match = NUMBER_PATTERN.exec(expression.slice(position));
      if (match) {
        tokens.push({ type: "number", value: new Decimal(match[0]), position });
        position += match[0].length;
        continue;
      }

      throw new ExpressionError(
        `Unexpected character '${char}' at position ${position} in "${expression}"`
      );
    }

    return tokens;
  }
}

/**
 * Recursive-descent parser over the token stream
 *
 *   expression := term (("+" | "-") term)*
 *   term       := factor (("*" | "/") factor)*
 *   factor     := ("+" | "-") factor | "(" expression ")" | number
 */
class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string
  ) {}

  parse(): Decimal {
    const value = this.parseExpression();
    const trailing = this.peek();
    if (trailing) {
      throw this.unexpected(trailing);
    }
    return value;
  }

  private parseExpression(): Decimal {
    let value = this.parseTerm();

    for (;;) {
      const token = this.peek();
      if (token?.type !== "operator") {
        break;
      }
      if (token.value === "+") {
        this.index += 1;
        value = value.plus(this.parseTerm());
      } else if (token.value === "-") {
        this.index += 1;
        value = value.minus(this.parseTerm());
      } else {
        break;
      }
    }

    return value;
  }

  private parseTerm(): Decimal {
    let value = this.parseFactor();

    for (;;) {
      const token = this.peek();
      if (token?.type !== "operator") {
        break;
      }
      if (token.value === "*") {
        this.index += 1;
        value = value.times(this.parseFactor());
      } else if (token.value === "/") {
        this.index += 1;
        const divisor = this.parseFactor();
        if (divisor.isZero()) {
          throw new ExpressionError(`Division by zero in "${this.source}"`);
        }
        value = value.dividedBy(divisor);
      } else {
        break;
      }
    }

    return value;
  }

  private parseFactor(): Decimal {
    const token = this.next();

    if (!token) {
      throw new ExpressionError(`Unexpected end of expression in "${this.source}"`);
    }

    switch (token.type) {
      case "number":
        return token.value;

      case "operator":
        if (token.value === "-") {
          return this.parseFactor().negated();
        }
        if (token.value === "+") {
          return this.parseFactor();
        }
        throw this.unexpected(token);

      case "paren": {
        if (token.value === ")") {
          throw this.unexpected(token);
        }
        const value = this.parseExpression();
        const closing = this.next();
        if (!closing || closing.type !== "paren" || closing.value !== ")") {
          throw new ExpressionError(`Missing closing parenthesis in "${this.source}"`);
        }
        return value;
      }
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index];
    this.index += 1;
    return token;
  }

  private unexpected(token: Token): ExpressionError {
    const text = token.type === "number" ? token.value.toString() : token.value;
    return new ExpressionError(
      `Unexpected '${text}' at position ${token.position} in "${this.source}"`
    );
  }
}

// Export singleton instance
export const expressionEvaluator = new ExpressionEvaluator();
