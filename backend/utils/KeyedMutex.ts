// backend/utils/KeyedMutex.ts

/**
 * キーごとに非同期処理を直列化する。
 * 同じ tradeId への遷移が同時に走らないようにするためのもの。
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>()

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => undefined
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this.tails.set(key, tail)

    await previous
    try {
      return await task()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key)
  }
}
