/**
 * Expression Evaluator
 *
 * Side-effect-free boolean expressions used by predicate edges and
 * conditional nodes. Expressions are parsed once into a tree and then
 * evaluated against a scope (context values plus, for edges, the outcome).
 *
 * Syntax:
 * - literals: 42, -1.5, 'text', "text", true, false, null
 * - names: ticket.priority, outcome.status, outcome.error.kind
 * - operators: ! == != < <= > >= && || in, parentheses
 *
 * @example
 * ```ts
 * const expr = Expression.parse("outcome.status == 'success' && score >= 0.8");
 * expr.test({ score: 0.9, outcome: { status: 'success' } }); // true
 * ```
 *
 * @module context
 */

const COMPARISONS = ['==', '!=', '<', '<=', '>', '>=', 'in'] as const;

type ComparisonOperator = (typeof COMPARISONS)[number];

type ExpressionNode =
  | { kind: 'literal'; value: unknown }
  | { kind: 'name'; path: string[] }
  | { kind: 'not'; operand: ExpressionNode }
  | { kind: 'and' | 'or'; left: ExpressionNode; right: ExpressionNode }
  | { kind: 'compare'; operator: ComparisonOperator; left: ExpressionNode; right: ExpressionNode };

type Token =
  | { type: 'number'; value: number; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'name'; value: string; pos: number }
  | { type: 'op'; value: string; pos: number }
  | { type: 'eof'; pos: number };

const OPERATORS = ['==', '!=', '<=', '>=', '&&', '||', '<', '>', '!', '(', ')', '.'];
function isComparison(value: string): value is ComparisonOperator {
  return COMPARISONS.some(operator => operator === value);
}

/**
 * Raised for malformed expressions
 */
export class ExpressionSyntaxError extends Error {
  constructor(message: string, public readonly source: string, public readonly position: number) {
    super(`${message} at position ${position} in "${source}"`);
    this.name = 'ExpressionSyntaxError';
  }
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Numbers, including a leading minus sign
    const numberMatch = /^-?\d+(\.\d+)?/.exec(source.slice(i));
    if (numberMatch && (ch !== '-' || !isOperandEnd(tokens[tokens.length - 1]))) {
      tokens.push({ type: 'number', value: Number(numberMatch[0]), pos: i });
      i += numberMatch[0].length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let j = i + 1;
      let value = '';
      while (j < source.length && source[j] !== ch) {
        if (source[j] === '\\' && j + 1 < source.length) {
          j++;
        }
        value += source[j];
        j++;
      }
      if (j >= source.length) {
        throw new ExpressionSyntaxError('Unterminated string', source, i);
      }
      tokens.push({ type: 'string', value, pos: i });
      i = j + 1;
      continue;
    }

    const nameMatch = /^[A-Za-z_$][\w$]*/.exec(source.slice(i));
    if (nameMatch) {
      tokens.push({ type: 'name', value: nameMatch[0], pos: i });
      i += nameMatch[0].length;
      continue;
    }

    const op = OPERATORS.find(candidate => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ type: 'op', value: op, pos: i });
      i += op.length;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character "${ch}"`, source, i);
  }

  tokens.push({ type: 'eof', pos: source.length });
  return tokens;
}

function isOperandEnd(token: Token | undefined): boolean {
  if (!token) return false;
  if (token.type === 'op') return token.value === ')';
  return token.type !== 'eof';
}

/**
 * Recursive descent parser
 *
 * or      := and ('||' and)*
 * and     := compare ('&&' compare)*
 * compare := unary (cmp unary)?
 * unary   := '!' unary | primary
 * primary := literal | name ('.' name)* | '(' or ')'
 */
class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[], private readonly source: string) {}

  parse(): ExpressionNode {
    if (this.peek().type === 'eof') {
      throw new ExpressionSyntaxError('Empty expression', this.source, 0);
    }
    const node = this.parseOr();
    const rest = this.peek();
    if (rest.type !== 'eof') {
      throw new ExpressionSyntaxError('Unexpected token', this.source, rest.pos);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'eof') {
      this.index++;
    }
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.type === 'op' && token.value === value;
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.isOp('||')) {
      this.next();
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseCompare();
    while (this.isOp('&&')) {
      this.next();
      left = { kind: 'and', left, right: this.parseCompare() };
    }
    return left;
  }

  private parseCompare(): ExpressionNode {
    const left = this.parseUnary();
    const token = this.peek();
    const operator = token.type === 'op' || token.type === 'name' ? token.value : undefined;
    if (operator !== undefined && isComparison(operator)) {
      this.next();
      const right = this.parseUnary();
      return { kind: 'compare', operator, left, right };
    }
    return left;
  }

  private parseUnary(): ExpressionNode {
    if (this.isOp('!')) {
      this.next();
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();

    switch (token.type) {
      case 'number':
      case 'string':
        return { kind: 'literal', value: token.value };

      case 'name': {
        if (token.value === 'true') return { kind: 'literal', value: true };
        if (token.value === 'false') return { kind: 'literal', value: false };
        if (token.value === 'null') return { kind: 'literal', value: null };
        if (token.value === 'in') {
          throw new ExpressionSyntaxError('Unexpected operator "in"', this.source, token.pos);
        }

        const path = [token.value];
        while (this.isOp('.')) {
          this.next();
          const segment = this.next();
          if (segment.type !== 'name') {
            throw new ExpressionSyntaxError('Expected a name after "."', this.source, segment.pos);
          }
          path.push(segment.value);
        }
        return { kind: 'name', path };
      }

      case 'op':
        if (token.value === '(') {
          const inner = this.parseOr();
          if (!this.isOp(')')) {
            throw new ExpressionSyntaxError('Expected ")"', this.source, this.peek().pos);
          }
          this.next();
          return inner;
        }
        throw new ExpressionSyntaxError(`Unexpected "${token.value}"`, this.source, token.pos);

      default:
        throw new ExpressionSyntaxError('Unexpected end of expression', this.source, token.pos);
    }
  }
}

/**
 * Truthiness used for predicates and rules.
 * The strings "", "false" and "0" count as false.
 */
export function isTruthy(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return value !== 'false' && value !== '0' && value !== '';
  }
  return Boolean(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(scope: Readonly<Record<string, unknown>>, path: string[]): unknown {
  let value: unknown = scope;
  for (const part of path) {
    if (Array.isArray(value) && /^\d+$/.test(part)) {
      value = value[Number(part)];
    } else if (isRecord(value) && Object.prototype.hasOwnProperty.call(value, part)) {
      value = value[part];
    } else if (Array.isArray(value) && part === 'length') {
      value = value.length;
    } else {
      return undefined;
    }
  }
  return value;
}

function equals(left: unknown, right: unknown): boolean {
  if (left === right) return true;
  if (typeof left === 'object' && typeof right === 'object' && left !== null && right !== null) {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return false;
}

function order<T extends number | string>(operator: '<' | '<=' | '>' | '>=', left: T, right: T): boolean {
  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}

function compare(operator: ComparisonOperator, left: unknown, right: unknown): boolean {
  switch (operator) {
    case '==':
      return equals(left, right);
    case '!=':
      return !equals(left, right);
    case 'in':
      if (Array.isArray(right)) return right.some(item => equals(item, left));
      if (typeof right === 'string' && typeof left === 'string') return right.includes(left);
      if (isRecord(right) && typeof left === 'string') return Object.prototype.hasOwnProperty.call(right, left);
      return false;
    default: {
      if (typeof left === 'number' && typeof right === 'number') return order(operator, left, right);
      if (typeof left === 'string' && typeof right === 'string') return order(operator, left, right);
      return false;
    }
  }
}

function evaluateNode(node: ExpressionNode, scope: Readonly<Record<string, unknown>>): unknown {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'name':
      return lookup(scope, node.path);
    case 'not':
      return !isTruthy(evaluateNode(node.operand, scope));
    case 'and':
      return isTruthy(evaluateNode(node.left, scope)) && isTruthy(evaluateNode(node.right, scope));
    case 'or':
      return isTruthy(evaluateNode(node.left, scope)) || isTruthy(evaluateNode(node.right, scope));
    case 'compare':
      return compare(node.operator, evaluateNode(node.left, scope), evaluateNode(node.right, scope));
  }
}

/**
 * A parsed, reusable expression
 */
export class Expression {
  private constructor(public readonly source: string, private readonly root: ExpressionNode) {}

  /**
   * Parse an expression
   *
   * @throws ExpressionSyntaxError if the source is malformed
   */
  static parse(source: string): Expression {
    const tokens = tokenize(source);
    return new Expression(source, new Parser(tokens, source).parse());
  }

  /**
   * Check syntax without keeping the result
   *
   * @returns Error message, or undefined when the expression is well formed
   */
  static check(source: string): string | undefined {
    try {
      Expression.parse(source);
      return undefined;
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  }

  /**
   * Raw value of the expression
   */
  evaluate(scope: Readonly<Record<string, unknown>>): unknown {
    return evaluateNode(this.root, scope);
  }

  /**
   * Truthiness of the expression
   */
  test(scope: Readonly<Record<string, unknown>>): boolean {
    return isTruthy(this.evaluate(scope));
  }
}

/**
 * Most parsed expressions kept by compileExpression; the least recently
 * used one is evicted first
 */
export const EXPRESSION_CACHE_LIMIT = 512;

/**
 * Parse cache shared by the router and the conditional handler.
 * An expression string always parses the same way.
 */
const cache = new Map<string, Expression>();

export function compileExpression(source: string): Expression {
  const cached = cache.get(source);
  if (cached) {
    // Map keeps insertion order: re-inserting marks it most recently used
    cache.delete(source);
    cache.set(source, cached);
    return cached;
  }

  const compiled = Expression.parse(source);
  if (cache.size >= EXPRESSION_CACHE_LIMIT) {
    const oldest = cache.keys().next();
    if (!oldest.done) {
      cache.delete(oldest.value);
    }
  }
  cache.set(source, compiled);
  return compiled;
}
