import { EngineLogger, createEngineLogger } from '../src/logging/EngineLogger.js';
import { RecordingSink } from '../src/testing/RecordingSink.js';
import { LogLevel } from '../src/types/log-types.js';
import { MissingKeyError } from '../src/errors/RunErrors.js';

function plainLogger(recorder: RecordingSink, level: LogLevel = LogLevel.DEBUG): EngineLogger {
  return new EngineLogger({ level, sink: recorder.sink, colors: false, timestamp: false });
}

describe('EngineLogger', () => {
  it('writes text lines with context pairs', () => {
    const recorder = new RecordingSink();
    plainLogger(recorder).info('Run started', { runId: 'r1', steps: 2, path: ['a'] });

    expect(recorder.lines).toEqual(['INFO  [graphrun] Run started runId=r1 steps=2 path=["a"]']);
  });

  it('describes errors with their code', () => {
    const recorder = new RecordingSink();
    plainLogger(recorder).error('Load failed', new MissingKeyError(['a']));

    expect(recorder.lines).toEqual([
      'ERROR [graphrun] Load failed error=RunError: Required context keys that are missing: a (GR-R-001)',
    ]);
    expect(recorder.entries[0].error).toEqual({
      name: 'RunError',
      message: 'Required context keys that are missing: a',
      code: 'GR-R-001',
    });
  });

  it('drops entries below the level', () => {
    const recorder = new RecordingSink();
    const logger = plainLogger(recorder, LogLevel.WARN);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.fatal('shown too');

    expect(recorder.messages()).toEqual(['shown', 'shown too']);
    expect(recorder.messages(LogLevel.WARN)).toEqual(['shown']);
  });

  it('writes JSON lines', () => {
    const recorder = new RecordingSink();
    const logger = new EngineLogger({ level: LogLevel.INFO, format: 'json', sink: recorder.sink, category: 'analysis' });

    logger.warn('Slow node', { nodeId: 'a' });
    const record: unknown = JSON.parse(recorder.lines[0]);

    expect(record).toEqual({
      timestamp: recorder.entries[0].timestamp.toISOString(),
      level: 'warn',
      source: 'graphrun',
      category: 'analysis',
      message: 'Slow node',
      context: { nodeId: 'a' },
    });
  });

  it('tags child loggers with their source', () => {
    const recorder = new RecordingSink();
    plainLogger(recorder).child('parser').debug('Parsed');

    expect(recorder.lines).toEqual(['DEBUG [parser] Parsed']);
  });
});

describe('createEngineLogger', () => {
  it('returns null when silent', () => {
    expect(createEngineLogger('silent')).toBeNull();
  });

  it('maps level names', () => {
    expect(createEngineLogger('warn')?.willLog(LogLevel.INFO)).toBe(false);
    expect(createEngineLogger('warn')?.willLog(LogLevel.ERROR)).toBe(true);
  });

  it('logs everything with timestamps when verbose', () => {
    const logger = createEngineLogger('error', true);

    expect(logger?.willLog(LogLevel.DEBUG)).toBe(true);
    expect(logger?.getConfig().timestamp).toBe(true);
  });
});
