// Per-key mutual exclusion for async critical sections
// Calls for the same key run one after another; different keys never wait on each other

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  /**
   * Runs fn once every earlier holder of `key` has finished
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>(resolve => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      // Last holder out drops the key so the map does not grow with every client
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  get pendingKeys(): number {
    return this.tails.size
  }
}
