import { EventBus } from '../src/events/EventBus.js';
import { EngineEventType, createEvent, type EngineEvent } from '../src/events/EngineEvents.js';

function cancelled(runId: string): EngineEvent {
  return createEvent(EngineEventType.RUN_CANCELLED, { stepsExecuted: 0 }, { runId });
}

describe('EventBus', () => {
  it('delivers to typed handlers before wildcard handlers', async () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.on('*', event => {
      seen.push(`*:${event.type}`);
    });
    bus.on('run.cancelled', event => {
      seen.push(`typed:${event.runId}`);
    });

    await bus.emit(cancelled('r1'));

    expect(seen).toEqual(['typed:r1', '*:run.cancelled']);
  });

  it('unsubscribes', async () => {
    const bus = new EventBus();
    const handler = jest.fn();
    const unsubscribe = bus.on(EngineEventType.RUN_CANCELLED, handler);

    unsubscribe();
    await bus.emit(cancelled('r1'));

    expect(handler).not.toHaveBeenCalled();
    expect(bus.listenerCount('run.cancelled')).toBe(0);
  });

  it('delivers once-handlers a single time', async () => {
    const bus = new EventBus();
    const handler = jest.fn();
    bus.once('run.cancelled', handler);

    await bus.emit(cancelled('r1'));
    await bus.emit(cancelled('r2'));

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('reports handler failures and keeps delivering', async () => {
    const reporter = jest.fn();
    const bus = new EventBus(reporter);
    const failure = new Error('handler broke');
    const after = jest.fn();
    bus.on('run.cancelled', () => {
      throw failure;
    });
    bus.on('run.cancelled', after);

    const event = cancelled('r1');
    await bus.emit(event);

    expect(reporter).toHaveBeenCalledWith(failure, event);
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('awaits async handlers in order', async () => {
    const bus = new EventBus();
    const order: number[] = [];
    bus.on('run.cancelled', async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
      order.push(1);
    });
    bus.on('run.cancelled', () => {
      order.push(2);
    });

    await bus.emit(cancelled('r1'));

    expect(order).toEqual([1, 2]);
  });
});

describe('createEvent', () => {
  it('omits nodeId unless given', () => {
    const runEvent = createEvent(EngineEventType.RUN_CANCELLED, { stepsExecuted: 1 }, { runId: 'r1' });
    const nodeEvent = createEvent(
      EngineEventType.NODE_STARTED,
      { nodeType: 'model', attempt: 1, step: 1 },
      { runId: 'r1', nodeId: 'a' }
    );

    expect('nodeId' in runEvent).toBe(false);
    expect(nodeEvent.nodeId).toBe('a');
    expect(nodeEvent.payload).toEqual({ nodeType: 'model', attempt: 1, step: 1 });
  });
});
