import { TypedEventEmitter } from '@tagstream/core';
import { spyLogger } from './src/helpers.js';

interface Events {
  tick: (count: number) => void;
}

test('a throwing listener is logged and the rest still run', () => {
  const logger = spyLogger();
  const emitter = new TypedEventEmitter<Events>(logger);
  const seen: number[] = [];
  emitter.on('tick', () => { throw new Error('listener bug'); });
  emitter.on('tick', (count) => seen.push(count));

  expect(emitter.emit('tick', 1)).toBe(true);

  expect(seen).toEqual([1]);
  expect(logger.error).toHaveBeenCalledWith('Listener for "tick" threw:', expect.any(Error));
});

test('once listeners run a single time', () => {
  const emitter = new TypedEventEmitter<Events>(spyLogger());
  const seen: number[] = [];
  emitter.once('tick', (count) => seen.push(count));

  emitter.emit('tick', 1);
  emitter.emit('tick', 2);

  expect(seen).toEqual([1]);
  expect(emitter.listenerCount('tick')).toBe(0);
});

test('off and removeAllListeners detach listeners', () => {
  const emitter = new TypedEventEmitter<Events>(spyLogger());
  const listener = jest.fn();
  emitter.on('tick', listener);
  emitter.off('tick', listener);
  emitter.on('tick', jest.fn());
  emitter.removeAllListeners();

  expect(emitter.emit('tick', 1)).toBe(false);
  expect(listener).not.toHaveBeenCalled();
});
