import { describe, test, expect, vi } from 'vitest';
import { EventEmitter, EventEmitterProtected } from './event-emitter';

describe('EventEmitter', () => {
  test('basic event subscription and emission', () => {
    const emitter = new EventEmitter();
    const callback = vi.fn();

    emitter.on('test', callback);
    emitter.emit('test', 'hello');

    expect(callback).toHaveBeenCalledWith('hello');
  });

  test('unsubscribe from event', () => {
    const emitter = new EventEmitter();
    const callback = vi.fn();

    const unsubscribe = emitter.on('test', callback);
    unsubscribe();
    emitter.emit('test', 'hello');

    expect(callback).not.toHaveBeenCalled();
    expect(emitter.hasListeners('test')).toBe(false);
  });

  test('once subscription', () => {
    const emitter = new EventEmitter();
    const callback = vi.fn();

    emitter.once('test', callback);
    emitter.emit('test', 'first');
    emitter.emit('test', 'second');

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith('first');
  });

  test('listeners run in subscription order', () => {
    const emitter = new EventEmitter();
    const calls: string[] = [];

    emitter.on('test', () => calls.push('a'));
    emitter.on('test', () => calls.push('b'));
    emitter.emit('test');

    expect(calls).toEqual(['a', 'b']);
  });

  test('hasListeners and listenerCount', () => {
    const emitter = new EventEmitter();

    expect(emitter.hasListeners('test')).toBe(false);
    expect(emitter.listenerCount('test')).toBe(0);

    emitter.on('test', vi.fn());
    emitter.on('test', vi.fn());

    expect(emitter.hasListeners('test')).toBe(true);
    expect(emitter.listenerCount('test')).toBe(2);
  });

  test('clear specific event and all events', () => {
    const emitter = new EventEmitter();
    const first = vi.fn();
    const second = vi.fn();

    emitter.on('first', first);
    emitter.on('second', second);

    emitter.clear('first');
    emitter.emit('first');
    emitter.emit('second');

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);

    emitter.clear();
    emitter.emit('second');

    expect(second).toHaveBeenCalledTimes(1);
  });

  test('a throwing listener propagates by default', () => {
    const emitter = new EventEmitter();
    const after = vi.fn();

    emitter.on('test', () => {
      throw new Error('listener failed');
    });
    emitter.on('test', after);

    expect(() => emitter.emit('test')).toThrow('listener failed');
    expect(after).not.toHaveBeenCalled();
  });
});

describe('EventEmitterProtected', () => {
  class CollectingEmitter extends EventEmitterProtected {
    public errors: Array<{ event: string; error: unknown }> = [];

    public trigger(event: string, data?: unknown): void {
      this.emit(event, data);
    }

    protected handleListenerError(event: string, error: unknown): void {
      this.errors.push({ event, error });
    }
  }

  test('protected emit can be called from derived class', () => {
    const emitter = new CollectingEmitter();
    const callback = vi.fn();

    emitter.on('test', callback);
    emitter.trigger('test', 42);

    expect(callback).toHaveBeenCalledWith(42);
  });

  test('overridden error handler keeps the remaining listeners running', () => {
    const emitter = new CollectingEmitter();
    const failure = new Error('boom');
    const after = vi.fn();

    emitter.on('test', () => {
      throw failure;
    });
    emitter.on('test', after);
    emitter.trigger('test');

    expect(after).toHaveBeenCalledTimes(1);
    expect(emitter.errors).toEqual([{ event: 'test', error: failure }]);
  });
});
