import { describe, expect, it } from 'vitest';

import { EventBus } from './bus';
import { createEnvelope, type EmitContext } from './emit';

const context: EmitContext = { runId: 'run-1' };

const log = (message: string) =>
  createEnvelope({
    type: 'log.message',
    source: 'cli',
    level: 'info',
    context,
    payload: { message },
  });

const written = createEnvelope({
  type: 'document.written',
  source: 'engine',
  level: 'info',
  context,
  payload: { path: 'docs/ROADMAP.md', bytes: 12, changed: true },
});

describe('EventBus', () => {
  it('delivers only the requested type to typed listeners', async () => {
    const bus = new EventBus();
    const paths: string[] = [];
    bus.on('document.written', (event) => {
      paths.push(event.payload.path);
    });

    await bus.emit(log('hello'));
    await bus.emit(written);

    expect(paths).toEqual(['docs/ROADMAP.md']);
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new EventBus();
    const seen: string[] = [];
    const off = bus.subscribe((event) => {
      seen.push(event.type);
    });

    await bus.emit(log('first'));
    off();
    await bus.emit(log('second'));

    expect(seen).toEqual(['log.message']);
  });

  it('reaches every listener before reporting failures', async () => {
    const bus = new EventBus();
    let delivered = false;
    bus.subscribe(() => {
      throw new Error('renderer broke');
    });
    bus.subscribe(() => {
      delivered = true;
    });

    const error = await bus.emit(log('hello')).catch((caught: unknown) => caught);

    expect(delivered).toBe(true);
    expect(error).toBeInstanceOf(AggregateError);
    if (error instanceof AggregateError) {
      expect(error.message).toBe('Listeners failed for log.message');
      expect(error.errors).toHaveLength(1);
    }
  });
});
