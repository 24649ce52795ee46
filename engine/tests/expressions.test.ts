import {
  Expression,
  ExpressionSyntaxError,
  EXPRESSION_CACHE_LIMIT,
  compileExpression,
  isTruthy,
} from '../src/context/ExpressionEvaluator.js';

describe('Expression', () => {
  it('combines outcome and context values', () => {
    const expr = Expression.parse("outcome.status == 'success' && score >= 0.8");

    expect(expr.test({ score: 0.9, outcome: { status: 'success' } })).toBe(true);
    expect(expr.test({ score: 0.5, outcome: { status: 'success' } })).toBe(false);
    expect(expr.test({ score: 0.9, outcome: { status: 'failure' } })).toBe(false);
  });

  it('returns the raw value of a dotted name', () => {
    expect(Expression.parse('ticket.priority').evaluate({ ticket: { priority: 3 } })).toBe(3);
    expect(Expression.parse('ticket.owner.name').evaluate({ ticket: { priority: 3 } })).toBeUndefined();
  });

  it('binds && tighter than ||', () => {
    const scope = { a: true, b: false, c: false };

    expect(Expression.parse('a || b && c').test(scope)).toBe(true);
    expect(Expression.parse('(a || b) && c').test(scope)).toBe(false);
  });

  it('negates with !', () => {
    expect(Expression.parse('!approved').test({ approved: false })).toBe(true);
    expect(Expression.parse('!approved').test({ approved: 'false' })).toBe(true);
    expect(Expression.parse('!approved').test({ approved: 'yes' })).toBe(false);
  });

  it('reads negative number literals after an operator', () => {
    expect(Expression.parse('delta > -1').test({ delta: 0 })).toBe(true);
    expect(Expression.parse('delta > -1').test({ delta: -2 })).toBe(false);
  });

  it('supports in for arrays, strings and object keys', () => {
    expect(Expression.parse("'urgent' in tags").test({ tags: ['urgent', 'billing'] })).toBe(true);
    expect(Expression.parse("'spam' in tags").test({ tags: ['urgent', 'billing'] })).toBe(false);
    expect(Expression.parse("'lo' in word").test({ word: 'hello' })).toBe(true);
    expect(Expression.parse("'a' in obj").test({ obj: { a: 1 } })).toBe(true);
  });

  it('compares strings with strings and numbers with numbers only', () => {
    expect(Expression.parse("name < 'b'").test({ name: 'a' })).toBe(true);
    expect(Expression.parse("count > '3'").test({ count: 5 })).toBe(false);
  });

  it('compares structured values by content', () => {
    expect(Expression.parse('outcome.error == null').test({ outcome: { error: null } })).toBe(true);
    expect(Expression.parse('left == right').test({ left: { a: [1] }, right: { a: [1] } })).toBe(true);
  });

  it('exposes array length', () => {
    expect(Expression.parse('items.length == 3').test({ items: ['a', 'b', 'c'] })).toBe(true);
  });

  it('reports malformed expressions with their position', () => {
    expect(() => Expression.parse('a ==')).toThrow('Unexpected end of expression at position 4 in "a =="');
    expect(() => Expression.parse('')).toThrow(ExpressionSyntaxError);
    expect(Expression.check("'open")).toBe('Unterminated string at position 0 in "\'open"');
    expect(Expression.check('a && b')).toBeUndefined();
  });

  it('caches compiled expressions by source', () => {
    expect(compileExpression('x == 1')).toBe(compileExpression('x == 1'));
  });

  it('evicts the least recently used expression when full', () => {
    const first = compileExpression('evicted == 1');
    for (let i = 0; i < EXPRESSION_CACHE_LIMIT; i++) {
      compileExpression(`filler == ${i}`);
    }

    expect(compileExpression('evicted == 1')).not.toBe(first);
  });

  it('keeps an expression that is still in use', () => {
    const kept = compileExpression('kept == 1');
    for (let i = 0; i < EXPRESSION_CACHE_LIMIT - 1; i++) {
      compileExpression(`other == ${i}`);
    }
    compileExpression('kept == 1');
    compileExpression('other == -1');

    expect(compileExpression('kept == 1')).toBe(kept);
  });
});

describe('isTruthy', () => {
  it('treats "", "0" and "false" as false', () => {
    expect(isTruthy('')).toBe(false);
    expect(isTruthy('0')).toBe(false);
    expect(isTruthy('false')).toBe(false);
    expect(isTruthy('no')).toBe(true);
  });

  it('only treats the lower-case string "false" as false', () => {
    expect(isTruthy('FALSE')).toBe(true);
    expect(isTruthy('False')).toBe(true);
  });

  it('follows JavaScript truthiness for other values', () => {
    expect(isTruthy(0)).toBe(false);
    expect(isTruthy(null)).toBe(false);
    expect(isTruthy([])).toBe(true);
    expect(isTruthy(2)).toBe(true);
  });
});
