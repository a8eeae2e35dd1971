import { BoundedBuffer } from '../../shared/utils/bounded-buffer';
import { ValidationException } from '../../utils/exceptions';

describe('BoundedBuffer', () => {
  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new BoundedBuffer<number>(0)).toThrow(ValidationException);
    expect(() => new BoundedBuffer<number>(1.5)).toThrow(
      'Buffer capacity must be a positive integer, got 1.5'
    );
  });

  it('evicts the oldest item once full', () => {
    const buffer = new BoundedBuffer<number>(2);

    expect(buffer.push(1)).toBeUndefined();
    expect(buffer.push(2)).toBeUndefined();
    expect(buffer.push(3)).toBe(1);

    expect(buffer.toArray()).toEqual([2, 3]);
    expect(buffer.size).toBe(2);
  });

  it('pops from the newest end', () => {
    const buffer = new BoundedBuffer<string>(3);
    buffer.push('a');
    buffer.push('b');

    expect(buffer.pop()).toBe('b');
    expect(buffer.peekLast()).toBe('a');
    expect(buffer.toArray()).toEqual(['a']);
  });

  it('keeps chronological order across wrap-around', () => {
    const buffer = new BoundedBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach((n) => buffer.push(n));

    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.pop()).toBe(5);

    buffer.push(6);
    expect(buffer.toArray()).toEqual([3, 4, 6]);
  });

  it('returns undefined from pop and peekLast when empty', () => {
    const buffer = new BoundedBuffer<number>(1);

    expect(buffer.isEmpty()).toBe(true);
    expect(buffer.pop()).toBeUndefined();
    expect(buffer.peekLast()).toBeUndefined();
  });

  it('clears all items', () => {
    const buffer = new BoundedBuffer<number>(2);
    buffer.push(1);
    buffer.push(2);

    buffer.clear();

    expect(buffer.size).toBe(0);
    expect(buffer.toArray()).toEqual([]);
    expect(buffer.push(7)).toBeUndefined();
    expect(buffer.toArray()).toEqual([7]);
  });
});
