/**
 * Single-assignment completion handle. The first `resolve` or `reject` wins;
 * every later call is ignored and reported through the return value.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private settledValue = false;
  private resolveFn: (value: T) => void = () => undefined;
  private rejectFn: (error: Error) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
  }

  get settled(): boolean {
    return this.settledValue;
  }

  resolve(value: T): boolean {
    if (this.settledValue) return false;
    this.settledValue = true;
    this.resolveFn(value);
    return true;
  }

  reject(error: Error): boolean {
    if (this.settledValue) return false;
    this.settledValue = true;
    this.rejectFn(error);
    return true;
  }
}
