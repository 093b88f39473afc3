/**
 * @fileoverview Per-key async mutex
 *
 * Serializes async work that shares a key (an index entry id, a clause id)
 * while letting work on different keys run concurrently.
 *
 * @module lib/keyed-lock
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>()

  /**
   * Run `fn` once every earlier task for `key` has settled.
   * A failed task does not block the ones queued behind it.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size
  }
}
