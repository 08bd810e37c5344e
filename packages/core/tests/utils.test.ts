/**
 * Utilities — locks, timeouts, backoff, text budgeting
 */

import { describe, it, expect } from 'vitest'

import { ReadWriteLock, acquireAll } from '../src/utils/rw-lock.js'
import { withAbortableTimeout, withTimeout } from '../src/utils/timeout.js'
import { computeBackoff } from '../src/utils/backoff.js'
import { countChars, estimateTokens, stripReasoning, truncateToFit } from '../src/utils/text.js'
import { fitMessagesToBudget } from '../src/model/budget.js'

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

// -------------------------------------------------------------------
// 1. ReadWriteLock
// -------------------------------------------------------------------

describe('ReadWriteLock', () => {
  it('lets readers share the lock', async () => {
    const lock = new ReadWriteLock()
    const a = await lock.acquireRead()
    const b = await lock.acquireRead()
    expect(lock.isLocked).toBe(true)
    a()
    b()
    expect(lock.isLocked).toBe(false)
  })

  it('gives a waiting writer priority over new readers', async () => {
    const lock = new ReadWriteLock()
    const order: string[] = []

    const firstRead = await lock.acquireRead()
    const writer = lock.withWrite(() => {
      order.push('write')
    })
    const lateReader = lock.withRead(() => {
      order.push('late-read')
    })

    await tick()
    expect(order).toEqual([])

    firstRead()
    await Promise.all([writer, lateReader])
    expect(order).toEqual(['write', 'late-read'])
  })

  it('serializes writers in arrival order', async () => {
    const lock = new ReadWriteLock()
    const order: number[] = []
    await Promise.all(
      [1, 2, 3].map((n) =>
        lock.withWrite(async () => {
          await tick()
          order.push(n)
        }),
      ),
    )
    expect(order).toEqual([1, 2, 3])
  })

  it('releases the lock when the callback throws', async () => {
    const lock = new ReadWriteLock()
    await expect(
      lock.withWrite(() => {
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')
    expect(lock.isLocked).toBe(false)
  })

  it('acquires and releases several locks together', async () => {
    const locks = [new ReadWriteLock(), new ReadWriteLock()]
    const release = await acquireAll(locks, 'write')
    expect(locks.every((l) => l.isLocked)).toBe(true)
    release()
    expect(locks.some((l) => l.isLocked)).toBe(false)
  })
})

// -------------------------------------------------------------------
// 2. withTimeout / computeBackoff
// -------------------------------------------------------------------

describe('withTimeout', () => {
  it('rejects with the supplied error when work is too slow', async () => {
    const slow = new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200))
    await expect(withTimeout(slow, 10, () => new Error('too slow'))).rejects.toThrow('too slow')
  })

  it('passes results through and treats 0 as no limit', async () => {
    await expect(withTimeout(Promise.resolve(7), 50, () => new Error('x'))).resolves.toBe(7)
    await expect(withTimeout(Promise.resolve(8), 0, () => new Error('x'))).resolves.toBe(8)
  })
})

describe('withAbortableTimeout', () => {
  it('aborts the work and waits for it before rejecting', async () => {
    const order: string[] = []
    const work = (signal: AbortSignal) =>
      new Promise<string>((resolve) => {
        signal.addEventListener('abort', () => {
          order.push('aborted')
          setTimeout(() => {
            order.push('settled')
            resolve('late')
          }, 20)
        })
      })

    await expect(withAbortableTimeout(work, 10, () => new Error('too slow'))).rejects.toThrow('too slow')
    order.push('rejected')

    expect(order).toEqual(['aborted', 'settled', 'rejected'])
  })

  it('leaves the signal untouched when the work wins', async () => {
    let seen: AbortSignal | undefined
    const result = await withAbortableTimeout(
      async (signal) => {
        seen = signal
        return 3
      },
      50,
      () => new Error('x'),
    )

    expect(result).toBe(3)
    expect(seen?.aborted).toBe(false)
  })

  it('passes a rejection from the work through without aborting', async () => {
    let seen: AbortSignal | undefined
    const failing = withAbortableTimeout(
      async (signal) => {
        seen = signal
        throw new Error('broken')
      },
      50,
      () => new Error('x'),
    )

    await expect(failing).rejects.toThrow('broken')
    expect(seen?.aborted).toBe(false)
  })
})

describe('computeBackoff', () => {
  it('grows exponentially up to the cap without jitter', () => {
    const policy = { initialMs: 100, maxMs: 1000, factor: 2, jitter: 0 }
    expect([0, 1, 2, 3, 4].map((n) => computeBackoff(policy, n))).toEqual([100, 200, 400, 800, 1000])
  })

  it('keeps jitter within bounds', () => {
    const policy = { initialMs: 1000, maxMs: 10000, factor: 2, jitter: 0.1 }
    for (let i = 0; i < 20; i++) {
      const delay = computeBackoff(policy, 0)
      expect(delay).toBeGreaterThanOrEqual(900)
      expect(delay).toBeLessThanOrEqual(1100)
    }
  })
})

// -------------------------------------------------------------------
// 3. Text budgeting
// -------------------------------------------------------------------

describe('text budgeting', () => {
  it('estimates four characters per token', () => {
    expect(estimateTokens('')).toBe(0)
    expect(estimateTokens('abcd')).toBe(1)
    expect(estimateTokens('abcde')).toBe(2)
  })

  it('truncates to the longest prefix that fits with a marker', () => {
    expect(truncateToFit('hello world', 20, countChars)).toBe('hello world')
    expect(truncateToFit('hello world', 6, countChars)).toBe('hello…')
    expect(truncateToFit('hello world', 0, countChars)).toBe('')
  })

  it('strips reasoning blocks', () => {
    expect(stripReasoning('<think>plan it</think>Answer')).toBe('Answer')
    expect(stripReasoning('dangling thoughts</think>Answer')).toBe('Answer')
  })

  it('drops the oldest non-system messages before truncating the last', () => {
    const fitted = fitMessagesToBudget(
      [
        { role: 'system', content: 's'.repeat(10) },
        { role: 'user', content: 'a'.repeat(10) },
        { role: 'assistant', content: 'b'.repeat(10) },
        { role: 'user', content: 'c'.repeat(10) },
      ],
      25,
      countChars,
    )
    expect(fitted).toEqual([
      { role: 'system', content: 's'.repeat(10) },
      { role: 'user', content: 'c'.repeat(10) },
    ])

    const truncated = fitMessagesToBudget(
      [
        { role: 'system', content: 's'.repeat(10) },
        { role: 'user', content: 'c'.repeat(20) },
      ],
      15,
      countChars,
    )
    expect(truncated[1].content).toBe('cccc…')
  })

  it('truncates system messages when they alone overflow', () => {
    const fitted = fitMessagesToBudget(
      [
        { role: 'system', content: 's'.repeat(30) },
        { role: 'system', content: 't'.repeat(30) },
        { role: 'user', content: 'a'.repeat(10) },
        { role: 'user', content: 'c'.repeat(20) },
      ],
      20,
      countChars,
    )

    expect(fitted).toEqual([
      { role: 'system', content: `${'s'.repeat(9)}…` },
      { role: 'user', content: `${'c'.repeat(9)}…` },
    ])
    expect(fitted.reduce((sum, m) => sum + countChars(m.content), 0)).toBeLessThanOrEqual(20)
  })

  it('leaves a short final message whole while trimming the system prompt', () => {
    const fitted = fitMessagesToBudget(
      [
        { role: 'system', content: 's'.repeat(40) },
        { role: 'user', content: 'hi' },
      ],
      20,
      countChars,
    )

    expect(fitted).toEqual([
      { role: 'system', content: `${'s'.repeat(17)}…` },
      { role: 'user', content: 'hi' },
    ])
  })
})
