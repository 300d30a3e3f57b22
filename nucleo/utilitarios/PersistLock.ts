/**
 * Lock cooperativo baseado em cadeia de promises.
 *
 * Operações passadas a `run` executam uma de cada vez, na ordem de chegada.
 * Um erro em uma operação é propagado ao seu chamador e não trava a fila.
 */
class PersistLock {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;

    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });

    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }
}

export { PersistLock };
