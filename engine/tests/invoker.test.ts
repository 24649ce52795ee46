import { NodeInvoker } from '../src/execution/NodeInvoker.js';
import { classifyError, isRetryable, kindForStatus } from '../src/execution/ErrorClassifier.js';
import { assertJsonOutputs, mapModelResponse, mapToolResult } from '../src/execution/OutputMapper.js';
import { findNonJsonValue } from '../src/utils/jsonValue.js';
import { PassthroughNodeHandler } from '../src/execution/handlers/PassthroughNodeHandler.js';
import { MockScript, placeholderValue } from '../src/execution/handlers/MockNodeHandler.js';
import { createNode } from '../src/graph/GraphBuilder.js';
import { CapabilityError } from '../src/capabilities/CapabilityError.js';
import { ToolRegistry } from '../src/capabilities/ToolCapability.js';
import { CancellationError, TimeoutError } from '../src/automation/TimeoutManager.js';
import { NodeInvocationError } from '../src/errors/RunErrors.js';
import { ScriptedModel } from '../src/testing/ScriptedModel.js';
import { ScriptedTool } from '../src/testing/ScriptedTool.js';

const options = { goalRef: 'test-goal', timeoutMs: 1000 };

describe('classifyError', () => {
  it('maps capability error kinds', () => {
    expect(classifyError(new CapabilityError('rate_limited', 'slow down'))).toEqual({
      kind: 'RateLimited',
      message: 'slow down',
    });
    expect(classifyError(new CapabilityError('auth', 'denied')).kind).toBe('AuthFailure');
  });

  it('maps HTTP status codes carried by errors', () => {
    expect(classifyError(Object.assign(new Error('denied'), { status: 401 })).kind).toBe('AuthFailure');
    expect(classifyError(Object.assign(new Error('gone'), { statusCode: 404 })).kind).toBe('NotFound');
    expect(kindForStatus(422)).toBe('InvalidArgs');
    expect(kindForStatus(429)).toBe('RateLimited');
    expect(kindForStatus(503)).toBe('UpstreamFailure');
  });

  it('recognises deadlines and cancellation', () => {
    expect(classifyError(new TimeoutError('late', 10)).kind).toBe('Timeout');
    expect(classifyError(new CancellationError()).kind).toBe('Cancelled');
  });

  it('keeps the kind chosen by a NodeInvocationError', () => {
    expect(classifyError(new NodeInvocationError('InvalidOutput', 'no keys')).kind).toBe('InvalidOutput');
  });

  it('treats anything else as an upstream failure', () => {
    expect(classifyError(new Error('boom'))).toEqual({ kind: 'UpstreamFailure', message: 'boom' });
    expect(classifyError('boom')).toEqual({ kind: 'UpstreamFailure', message: 'boom' });
  });

  it('never retries a cancellation', () => {
    expect(isRetryable('Cancelled')).toBe(false);
    expect(isRetryable('Timeout')).toBe(true);
  });
});

describe('OutputMapper', () => {
  const single = createNode({ id: 'summarise', nodeType: 'model', outputKeys: ['summary'] });
  const pair = createNode({ id: 'split', nodeType: 'model', outputKeys: ['a', 'b'] });

  it('uses text directly for a single output key', () => {
    expect(mapModelResponse(single, { text: 'short' })).toEqual({ summary: 'short' });
  });

  it('parses fenced JSON text for several output keys', () => {
    expect(mapModelResponse(pair, { text: '```json\n{"a":1,"b":2,"c":3}\n```' })).toEqual({ a: 1, b: 2 });
  });

  it('prefers structured data', () => {
    expect(mapModelResponse(pair, { text: 'ignored', data: { a: 'x', b: 'y' } })).toEqual({ a: 'x', b: 'y' });
  });

  it('fails with InvalidOutput when keys are missing', () => {
    expect(() => mapModelResponse(pair, { data: { a: 1 } })).toThrow(
      'Model data for node "split" is missing output keys: b'
    );
    expect(() => mapModelResponse(pair, { text: 'not json' })).toThrow(NodeInvocationError);
  });

  it('maps tool results', () => {
    const tool = createNode({ id: 'lookup', nodeType: 'tool', toolRefs: ['weather'], outputKeys: ['weather'] });

    expect(mapToolResult(tool, { temp: 20 })).toEqual({ weather: { temp: 20 } });
    expect(() => mapToolResult(tool, undefined)).toThrow('Tool for node "lookup" returned nothing');
    expect(() => mapToolResult(pair, 'flat')).toThrow(
      'Tool for node "split" must return an object with keys: a, b'
    );
  });

  it('names the first produced value JSON cannot carry', () => {
    expect(findNonJsonValue({ a: [1, { b: 10n }] }, 'out')).toEqual({ path: 'out.a[1].b', type: 'bigint' });
    expect(findNonJsonValue(Infinity, 'x')).toEqual({ path: 'x', type: 'Infinity' });
    expect(findNonJsonValue({ a: undefined }, 'v')).toEqual({ path: 'v.a', type: 'undefined' });
    expect(findNonJsonValue(Object.assign(Object.create(null), { ok: [true, null, 'x'] }), 'v')).toBeUndefined();

    expect(() => assertJsonOutputs(pair, { a: 1, b: new Set([1]) })).toThrow(
      'Node "split" produced a Set at b, which is not a JSON value'
    );
    expect(() => assertJsonOutputs(pair, { a: 1, b: { nested: ['x'] } })).not.toThrow();
  });
});

describe('NodeInvoker', () => {
  const classify = createNode({ id: 'classify', nodeType: 'model', inputKeys: ['ticket'], outputKeys: ['category'] });

  it('delegates model nodes to the model capability', async () => {
    const model = new ScriptedModel({ classify: [{ text: 'billing', usage: { inputTokens: 10, outputTokens: 2 } }] });
    const invoker = NodeInvoker.create({ mode: 'live', model });

    const outcome = await invoker.invoke(classify, { ticket: 'refund please' }, options);

    expect(outcome).toEqual({
      status: 'success',
      produced: { category: 'billing' },
      usage: { inputTokens: 10, outputTokens: 2 },
    });
    expect(model.getCallsFor('classify')[0]).toEqual({
      nodeId: 'classify',
      goalRef: 'test-goal',
      instructions: '',
      context: { ticket: 'refund please' },
      toolRefs: [],
      outputKeys: ['category'],
    });
  });

  it('turns thrown errors into classified failures', async () => {
    const model = new ScriptedModel({ classify: [new CapabilityError('auth', 'bad key')] });
    const invoker = NodeInvoker.create({ mode: 'live', model });

    expect(await invoker.invoke(classify, { ticket: 't' }, options)).toEqual({
      status: 'failure',
      error: { kind: 'AuthFailure', message: 'bad key' },
    });
  });

  it('fails an attempt that outlives its deadline', async () => {
    const model = new ScriptedModel({ slow: [{ text: 'late' }] }, { delay: 500 });
    const slow = createNode({ id: 'slow', nodeType: 'model', outputKeys: ['answer'] });
    const invoker = NodeInvoker.create({ mode: 'live', model });

    expect(await invoker.invoke(slow, {}, { goalRef: 'g', timeoutMs: 20 })).toEqual({
      status: 'failure',
      error: { kind: 'Timeout', message: 'Operation "node slow" timed out after 20ms' },
    });
  });

  it('calls the referenced tool with the node inputs', async () => {
    const tools = new ToolRegistry().register('weather_lookup', args => ({ city: args.city, temp: 20 }));
    const node = createNode({
      id: 'weather',
      nodeType: 'tool',
      inputKeys: ['city'],
      outputKeys: ['forecast'],
      toolRefs: ['weather_lookup'],
    });
    const invoker = NodeInvoker.create({ mode: 'live', tools });

    expect(await invoker.invoke(node, { city: 'Lisbon' }, options)).toEqual({
      status: 'success',
      produced: { forecast: { city: 'Lisbon', temp: 20 } },
    });
  });

  it('fails a tool result JSON cannot carry', async () => {
    const tools = new ToolRegistry().register('weather_lookup', () => new Map([['temp', 20]]));
    const node = createNode({ id: 'weather', nodeType: 'tool', outputKeys: ['forecast'], toolRefs: ['weather_lookup'] });
    const invoker = NodeInvoker.create({ mode: 'live', tools });

    expect(await invoker.invoke(node, {}, options)).toEqual({
      status: 'failure',
      error: { kind: 'InvalidOutput', message: 'Node "weather" produced a Map at forecast, which is not a JSON value' },
    });
  });

  it('reports an unregistered tool as NotFound', async () => {
    const node = createNode({ id: 'x', nodeType: 'tool', toolRefs: ['missing'], outputKeys: ['y'] });
    const invoker = NodeInvoker.create({ mode: 'live', tools: new ScriptedTool() });

    const outcome = await invoker.invoke(node, {}, options);

    expect(outcome.status === 'failure' ? outcome.error.kind : outcome.status).toBe('NotFound');
  });

  it('selects the first matching conditional rule', async () => {
    const node = createNode({
      id: 'lane',
      nodeType: 'conditional',
      inputKeys: ['priority'],
      outputKeys: ['lane'],
      rules: [{ when: 'priority >= 3', output: { lane: 'urgent', ignored: true } }],
      otherwise: { lane: 'normal' },
    });
    const invoker = NodeInvoker.create({ mode: 'live' });

    expect(await invoker.invoke(node, { priority: 4 }, options)).toEqual({
      status: 'success',
      produced: { lane: 'urgent' },
    });
    expect(await invoker.invoke(node, { priority: 1 }, options)).toEqual({
      status: 'success',
      produced: { lane: 'normal' },
    });
  });

  it('fails a conditional with no match and no otherwise', async () => {
    const node = createNode({
      id: 'gate',
      nodeType: 'conditional',
      outputKeys: ['open'],
      rules: [{ when: 'ready', output: { open: true } }],
    });

    const outcome = await NodeInvoker.create({ mode: 'live' }).invoke(node, { ready: false }, options);

    expect(outcome).toEqual({
      status: 'failure',
      error: {
        kind: 'InvalidArgs',
        message: 'No rule of conditional node "gate" matched and it has no otherwise branch',
      },
    });
  });

  it('fails node types without a handler', async () => {
    const outcome = await new NodeInvoker().invoke(classify, {}, options);

    expect(outcome).toEqual({
      status: 'failure',
      error: { kind: 'InvalidArgs', message: "No handler registered for node type 'model'" },
    });
  });

  it('rejects a second handler for the same type', () => {
    const invoker = new NodeInvoker();
    invoker.register(new PassthroughNodeHandler());

    expect(() => invoker.register(new PassthroughNodeHandler())).toThrow(
      "Handler for node type 'terminal-pass' is already registered"
    );
  });

  it('returns placeholders in mock mode without external calls', async () => {
    const invoker = NodeInvoker.create({ mode: 'mock' });

    expect(invoker.isExternal('model')).toBe(false);
    expect(await invoker.invoke(classify, { ticket: 't' }, options)).toEqual({
      status: 'success',
      produced: { category: placeholderValue('classify', 'category') },
    });
  });
});

describe('MockScript', () => {
  it('plays scripted outcomes in order and repeats the last', () => {
    const node = createNode({ id: 'fetch', nodeType: 'tool', toolRefs: ['api'], outputKeys: ['body', 'status'] });
    const script = new MockScript({
      fetch: [{ status: 'failure', kind: 'RateLimited' }, { status: 'success', produced: { status: 200 } }],
    });

    expect(script.next(node)).toEqual({
      status: 'failure',
      error: { kind: 'RateLimited', message: 'Scripted failure of node "fetch"' },
    });
    expect(script.next(node)).toEqual({
      status: 'success',
      produced: { body: '<mock:fetch.body>', status: 200 },
    });
    expect(script.next(node)).toEqual({
      status: 'success',
      produced: { body: '<mock:fetch.body>', status: 200 },
    });
  });
});
