export class EventStream<T, R> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiting: Array<(value: IteratorResult<T>) => void> = [];
  private isDone = false;
  private resolveResult: (value: R) => void = () => {};
  private rejectResult: (error: Error) => void = () => {};
  private readonly resultPromise: Promise<R>;
  private observers: Array<(event: T) => void> = [];

  constructor(
    private readonly isComplete: (event: T) => boolean,
    private readonly extractResult: (event: T) => R,
  ) {
    this.resultPromise = new Promise<R>((resolve, reject) => {
      this.resolveResult = resolve;
      this.rejectResult = reject;
    });
    // Consumers that only iterate events still see failures as `error` events;
    // result() keeps rejecting for those who ask.
    this.resultPromise.catch(() => undefined);
  }

  get done(): boolean {
    return this.isDone;
  }

  /** Register an observer that receives every event (independent of the iterator). */
  subscribe(callback: (event: T) => void): () => void {
    this.observers.push(callback);
    return () => {
      this.observers = this.observers.filter((observer) => observer !== callback);
    };
  }

  push(event: T): void {
    if (this.isDone) return;
    for (const observer of this.observers) observer(event);
    if (this.isComplete(event)) {
      this.isDone = true;
      try {
        this.resolveResult(this.extractResult(event));
      } catch (err) {
        this.rejectResult(err instanceof Error ? err : new Error(String(err)));
      }
    }
    const resolve = this.waiting.shift();
    if (resolve) {
      resolve({ value: event, done: false });
    } else {
      this.queue.push(event);
    }
    if (this.isDone) this.releaseWaiting();
  }

  end(result: R): void {
    if (this.isDone) return;
    this.isDone = true;
    this.resolveResult(result);
    this.releaseWaiting();
  }

  error(err: Error): void {
    if (this.isDone) return;
    this.isDone = true;
    this.rejectResult(err);
    this.releaseWaiting();
  }

  result(): Promise<R> {
    return this.resultPromise;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => {
        if (this.queue.length > 0) {
          const [event] = this.queue.splice(0, 1);
          return Promise.resolve({ value: event, done: false });
        }
        if (this.isDone) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiting.push(resolve);
        });
      },
    };
  }

  private releaseWaiting(): void {
    for (const resolve of this.waiting) {
      resolve({ value: undefined, done: true });
    }
    this.waiting = [];
  }
}
