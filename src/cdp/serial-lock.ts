/**
 * Runs async sections one after another. Session lifecycle operations
 * (connect, attach, reconnect, close) go through one of these, and commands
 * wait on `idle()` so they never race a half-finished reconnect.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private depth = 0;

  get busy(): boolean {
    return this.depth > 0;
  }

  run<T>(section: () => Promise<T>): Promise<T> {
    this.depth++;
    const result = this.tail.then(section);
    this.tail = result.then(
      () => {
        this.depth--;
      },
      () => {
        this.depth--;
      },
    );
    return result;
  }

  /** Resolves once every section queued so far has finished. */
  idle(): Promise<void> {
    return this.tail;
  }
}
