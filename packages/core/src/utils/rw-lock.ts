/**
 * Readers-writer lock
 *
 * Many readers or one writer. A queued writer blocks new readers so
 * appends are not starved by a stream of snapshot reads.
 */

type Release = () => void

export class ReadWriteLock {
  private readers = 0
  private writing = false
  private readonly waitingWriters: Array<() => void> = []
  private readonly waitingReaders: Array<() => void> = []

  async acquireRead(): Promise<Release> {
    if (!this.writing && this.waitingWriters.length === 0) {
      this.readers++
    } else {
      // readers counter is bumped by whoever grants us
      await new Promise<void>((resolve) => this.waitingReaders.push(resolve))
    }
    return this.once(() => {
      this.readers--
      this.dispatch()
    })
  }

  async acquireWrite(): Promise<Release> {
    if (!this.writing && this.readers === 0) {
      this.writing = true
    } else {
      await new Promise<void>((resolve) => this.waitingWriters.push(resolve))
    }
    return this.once(() => {
      this.writing = false
      this.dispatch()
    })
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireRead()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireWrite()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  get isLocked(): boolean {
    return this.writing || this.readers > 0
  }

  private dispatch(): void {
    if (this.writing || this.readers > 0) return

    const writer = this.waitingWriters.shift()
    if (writer) {
      this.writing = true
      writer()
      return
    }

    const readers = this.waitingReaders.splice(0)
    this.readers += readers.length
    for (const grant of readers) grant()
  }

  private once(fn: () => void): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      fn()
    }
  }
}

/**
 * Acquire several locks in the given order and hand back one releaser.
 * Callers must pass locks in a stable global order.
 */
export async function acquireAll(
  locks: ReadWriteLock[],
  mode: 'read' | 'write',
): Promise<Release> {
  const releases: Release[] = []
  try {
    for (const lock of locks) {
      releases.push(mode === 'read' ? await lock.acquireRead() : await lock.acquireWrite())
    }
  } catch (error) {
    for (const release of releases.reverse()) release()
    throw error
  }
  return () => {
    for (const release of releases.reverse()) release()
  }
}
