/**
 * The replying half of a one-shot channel. Only the first `send` takes effect.
 */
export class OneShotSender<T> {
  private settled = false;

  /** @internal */
  constructor(private resolve: (value: T) => void) {}

  public send(value: T) {
    if (this.settled) {
      return;
    }
    this.settled = true;
    this.resolve(value);
  }
}

export function createOneShot<T>(): [OneShotSender<T>, Promise<T>] {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return [new OneShotSender(resolve), promise];
}
