/**
 * Async mutex serialising read-modify-write cycles on a shared document.
 */

export class Mutex {
  private locked = false
  private queue: Array<() => void> = []

  /**
   * Acquire the mutex lock.
   * If already locked, waits in queue until released.
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return
    }
    await new Promise<void>((resolve) => this.queue.push(resolve))
  }

  /**
   * Release the mutex lock and hand it to the next waiter, if any.
   */
  release(): void {
    const next = this.queue.shift()
    if (next) {
      next()
    } else {
      this.locked = false
    }
  }

  /**
   * Execute a function with mutex protection.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await fn()
    } finally {
      this.release()
    }
  }

  isLocked(): boolean {
    return this.locked
  }
}
