import { Deque } from '@tagstream/core';

test('push on a full deque evicts the oldest entry', () => {
  const deque = new Deque<number>(3);

  expect(deque.push(1)).toBeUndefined();
  expect(deque.push(2)).toBeUndefined();
  expect(deque.push(3)).toBeUndefined();
  expect(deque.isFull).toBe(true);
  expect(deque.push(4)).toBe(1);

  expect(deque.length).toBe(3);
  expect([deque.shift(), deque.shift(), deque.shift(), deque.shift()]).toEqual([2, 3, 4, undefined]);
});

test('keeps FIFO order across wrap-around', () => {
  const deque = new Deque<string>(2);
  deque.push('a');
  deque.push('b');
  expect(deque.shift()).toBe('a');
  deque.push('c');
  expect(deque.shift()).toBe('b');
  deque.push('d');

  expect([deque.shift(), deque.shift()]).toEqual(['c', 'd']);
  expect(deque.length).toBe(0);
});

test('kill empties the deque', () => {
  const deque = new Deque<number>(2);
  deque.push(1);
  deque.kill();

  expect(deque.length).toBe(0);
  expect(deque.shift()).toBeUndefined();
});

test('rejects a non-positive capacity', () => {
  expect(() => new Deque<number>(0)).toThrow(RangeError);
  expect(() => new Deque<number>(1.5)).toThrow(RangeError);
});
