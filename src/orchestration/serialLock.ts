/**
 * Runs async sections one at a time, in call order. A section that throws
 * does not block the ones queued after it.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
