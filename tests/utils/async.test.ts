// tests/utils/async.test.ts
import { describe, expect, it } from 'vitest'
import { Mailbox, SerialQueue } from '../../src/main/utils/async'

describe('SerialQueue', () => {
  it('serves holders in arrival order', async () => {
    const queue = new SerialQueue()
    const order: string[] = []

    const first = await queue.acquire()
    const second = queue.acquire().then(release => {
      order.push('second')
      release()
    })
    const third = queue.acquire().then(release => {
      order.push('third')
      release()
    })

    expect(queue.isHeld).toBe(true)
    expect(queue.pending).toBe(2)

    order.push('first')
    first()
    await Promise.all([second, third])

    expect(order).toEqual(['first', 'second', 'third'])
    expect(queue.isHeld).toBe(false)
  })

  it('ignores a second call of the same release function', async () => {
    const queue = new SerialQueue()
    const release = await queue.acquire()
    release()

    const next = await queue.acquire()
    release()
    expect(queue.isHeld).toBe(true)
    next()
    expect(queue.isHeld).toBe(false)
  })

  it('releases after a failing task', async () => {
    const queue = new SerialQueue()
    await expect(queue.run(async () => { throw new Error('boom') })).rejects.toThrow('boom')
    expect(queue.isHeld).toBe(false)
    await expect(queue.run(async () => 42)).resolves.toBe(42)
  })
})

describe('Mailbox', () => {
  it('runs handlers later, in posting order', async () => {
    const mailbox = new Mailbox()
    const seen: number[] = []

    const a = mailbox.post(() => { seen.push(1) })
    const b = mailbox.post(() => { seen.push(2) })
    expect(seen).toEqual([])
    expect(mailbox.size).toBe(2)

    await Promise.all([a, b])
    expect(seen).toEqual([1, 2])
    expect(mailbox.size).toBe(0)
  })

  it('keeps draining after a handler throws', async () => {
    const mailbox = new Mailbox()
    const seen: string[] = []

    const failing = mailbox.post(() => { throw new Error('handler failed') })
    const next = mailbox.post(() => { seen.push('next') })

    await expect(failing).resolves.toBeUndefined()
    await next
    expect(seen).toEqual(['next'])
  })

  it('uses the given scheduler', async () => {
    const scheduled: Array<() => void> = []
    const mailbox = new Mailbox(task => { scheduled.push(task) })
    let ran = false

    const posted = mailbox.post(() => { ran = true })
    expect(scheduled).toHaveLength(1)
    expect(ran).toBe(false)

    scheduled[0]()
    await posted
    expect(ran).toBe(true)
  })
})
