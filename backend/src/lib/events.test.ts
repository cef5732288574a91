import { describe, test, expect, vi } from 'vitest';
import { TypedEventEmitter } from './events';

type TestEvents = {
  ping: [value: number];
  done: [];
};

describe('TypedEventEmitter', () => {
  test('calls listeners in registration order', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const calls: string[] = [];
    emitter.on('ping', (v) => calls.push(`a${v}`));
    emitter.on('ping', (v) => calls.push(`b${v}`));

    emitter.emit('ping', 1);
    expect(calls).toEqual(['a1', 'b1']);
  });

  test('once listeners fire a single time', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const listener = vi.fn();
    emitter.once('done', listener);

    emitter.emit('done');
    emitter.emit('done');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount('done')).toBe(0);
  });

  test('subscribe returns an unsubscribe function', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    const listener = vi.fn();
    const off = emitter.subscribe('ping', listener);

    emitter.emit('ping', 1);
    off();
    emitter.emit('ping', 2);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(1);
  });

  test('a throwing listener is reported and does not stop the others', () => {
    const onError = vi.fn();
    const emitter = new TypedEventEmitter<TestEvents>(onError);
    const after = vi.fn();
    emitter.on('ping', () => {
      throw new Error('listener broke');
    });
    emitter.on('ping', after);

    emitter.emit('ping', 5);
    expect(after).toHaveBeenCalledWith(5);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][1]).toBe('ping');
  });

  test('removeAllListeners clears everything', () => {
    const emitter = new TypedEventEmitter<TestEvents>();
    emitter.on('ping', vi.fn());
    emitter.on('done', vi.fn());
    emitter.removeAllListeners();
    expect(emitter.listenerCount('ping')).toBe(0);
    expect(emitter.listenerCount('done')).toBe(0);
  });
});
