import { EdgeRouter, predicateScope } from '../src/execution/EdgeRouter.js';
import { GraphBuilder } from '../src/graph/GraphBuilder.js';
import { EngineLogger } from '../src/logging/EngineLogger.js';
import { RecordingSink } from '../src/testing/RecordingSink.js';
import { LogLevel } from '../src/types/log-types.js';
import { failureOutcome, successOutcome } from '../src/types/core-types.js';

describe('EdgeRouter', () => {
  const graph = new GraphBuilder('review')
    .model('score', { outputKeys: ['score'] })
    .passthrough('publish')
    .passthrough('retry')
    .passthrough('archive')
    .passthrough('slow')
    .edge('score', 'retry', 'on_failure')
    .when('score', 'slow', "outcome.error.kind == 'Timeout'")
    .when('score', 'publish', "outcome.status == 'success' && score >= 0.8")
    .edge('score', 'archive', 'on_success', { priority: 5 })
    .build();
  const router = new EdgeRouter(graph);

  it('takes the first matching edge in priority order', () => {
    expect(router.selectTarget('score', successOutcome({ score: 0.9 }), { score: 0.9 })).toBe('publish');
  });

  it('falls through to later edges', () => {
    expect(router.selectTarget('score', successOutcome({ score: 0.5 }), { score: 0.5 })).toBe('archive');
  });

  it('routes failures to on_failure edges', () => {
    expect(router.selectTarget('score', failureOutcome('Timeout', 'too slow'), {})).toBe('retry');
  });

  it('returns the selected edge', () => {
    expect(router.select('score', successOutcome({ score: 1 }), { score: 1 })?.id).toBe('e3');
  });

  it('returns undefined when nothing matches', () => {
    expect(router.select('publish', successOutcome({}), {})).toBeUndefined();
  });

  it('evaluates predicates against the failure detail', () => {
    const predicateFirst = new GraphBuilder('g')
      .model('a')
      .passthrough('slow')
      .passthrough('other')
      .when('a', 'slow', "outcome.error.kind == 'Timeout'")
      .edge('a', 'other', 'on_failure', { priority: 1 })
      .build();
    const predicateRouter = new EdgeRouter(predicateFirst);

    expect(predicateRouter.selectTarget('a', failureOutcome('Timeout', 'late'), {})).toBe('slow');
    expect(predicateRouter.selectTarget('a', failureOutcome('AuthFailure', 'denied'), {})).toBe('other');
  });

  it('skips and logs a predicate that cannot be parsed', () => {
    const unchecked = new GraphBuilder('g')
      .passthrough('a')
      .passthrough('b')
      .passthrough('c')
      .when('a', 'b', 'score >')
      .edge('a', 'c', 'always', { priority: 1 })
      .build();
    const recorder = new RecordingSink();
    const logger = new EngineLogger({ level: LogLevel.DEBUG, sink: recorder.sink, colors: false, timestamp: false });

    expect(new EdgeRouter(unchecked, logger).selectTarget('a', successOutcome({}), {})).toBe('c');
    expect(recorder.messages(LogLevel.WARN)).toEqual(['Predicate could not be evaluated; edge skipped']);
  });
});

describe('predicateScope', () => {
  it('adds the outcome beside the context', () => {
    expect(predicateScope(successOutcome({ x: 1 }), { x: 1, y: 2 })).toEqual({
      x: 1,
      y: 2,
      outcome: { status: 'success', error: null, produced: { x: 1 } },
    });
    expect(predicateScope(failureOutcome('NotFound', 'gone'), {})).toEqual({
      outcome: { status: 'failure', error: { kind: 'NotFound', message: 'gone' }, produced: {} },
    });
  });
});
