import { InterruptedError } from '../errors'

export type PoolWorker<T, R> = (item: T, index: number) => Promise<R>

/**
 * Runs an async worker over a list with at most `concurrency` calls in
 * flight. Results come back in input order whatever the completion order.
 */
export class WorkerPool {
  readonly concurrency: number

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${concurrency}`)
    }
    this.concurrency = concurrency
  }

  async map<T, R>(items: readonly T[], worker: PoolWorker<T, R>, signal?: AbortSignal): Promise<R[]> {
    if (signal?.aborted) {
      throw new InterruptedError()
    }

    const results = new Array<R>(items.length)
    let next = 0

    const lane = async (): Promise<void> => {
      while (next < items.length) {
        // Stop handing out work once aborted; in-flight calls are left to settle
        if (signal?.aborted) return
        const index = next++
        results[index] = await worker(items[index], index)
      }
    }

    const laneCount = Math.min(this.concurrency, items.length)
    const settled = Promise.all(Array.from({ length: laneCount }, () => lane()))

    if (!signal) {
      await settled
      return results
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(new InterruptedError())
      signal.addEventListener('abort', onAbort, { once: true })
      settled.then(
        () => {
          signal.removeEventListener('abort', onAbort)
          if (signal.aborted) {
            reject(new InterruptedError())
          } else {
            resolve()
          }
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort)
          reject(error)
        }
      )
    })

    return results
  }
}
