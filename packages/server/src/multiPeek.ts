/**
 * Iterator adaptor that can look any number of items ahead.
 *
 * Each `peek` moves a peek cursor one item further; `next` consumes from
 * the front and resets the cursor, as does `resetPeek`.
 */
export class MultiPeek<T> implements IterableIterator<T> {
  private readonly source: Iterator<T>;
  private readonly buffer: T[] = [];
  private peekIndex = 0;
  private exhausted = false;

  constructor(source: Iterable<T>) {
    this.source = source[Symbol.iterator]();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this;
  }

  next(): IteratorResult<T> {
    this.peekIndex = 0;
    if (this.buffer.length > 0) {
      const [head] = this.buffer.splice(0, 1);
      return { done: false, value: head };
    }
    return this.pull();
  }

  /** The item after the last peeked one, or `undefined` at the end */
  peek(): T | undefined {
    if (this.peekIndex < this.buffer.length) {
      return this.buffer[this.peekIndex++];
    }
    const result = this.pull();
    if (result.done) {
      return undefined;
    }
    this.buffer.push(result.value);
    this.peekIndex++;
    return result.value;
  }

  resetPeek(): void {
    this.peekIndex = 0;
  }

  private pull(): IteratorResult<T> {
    if (this.exhausted) {
      return { done: true, value: undefined };
    }
    const result = this.source.next();
    if (result.done) {
      this.exhausted = true;
    }
    return result;
  }
}
