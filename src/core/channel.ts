/**
 * Bounded multiple-producer, single-consumer queue. Producers wait only when
 * the buffer is full; the consumer waits when it is empty.
 */
export class Channel<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<(value: T) => void> = [];
  private readonly senders: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (capacity < 1) throw new RangeError('Channel capacity must be at least 1');
  }

  async send(value: T): Promise<void> {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return;
    }
    while (this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.senders.push(resolve));
    }
    this.buffer.push(value);
  }

  async recv(): Promise<T> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      this.senders.shift()?.();
      return value;
    }
    return new Promise<T>((resolve) => this.receivers.push(resolve));
  }

  get size(): number {
    return this.buffer.length;
  }
}
