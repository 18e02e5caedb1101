import * as grpc from "@grpc/grpc-js"

import type { Logger } from "../log.js"
import { createLogger } from "../log.js"

export interface BroadcastStreamOptions {
  /** Prefix of the trace lines, e.g. the RPC name */
  label?: string
  logger?: Logger
  /**
   * Values a subscriber may hold unread before the upstream is paused.
   * Defaults to 64.
   */
  maxBuffered?: number
}

const DEFAULT_MAX_BUFFERED = 64

interface PendingRead<T> {
  resolve: (result: IteratorResult<T>) => void
  reject: (error: Error) => void
}

/**
 * One consumer of a {@link BroadcastStream}
 *
 * Values pushed while nobody awaits `next()` are buffered per
 * subscription, so a slow consumer never holds back the others.
 */
export class StreamSubscription<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = []
  private readonly pending: PendingRead<T>[] = []
  private failure: Error | null = null
  private ended = false
  private detached = false

  constructor(
    private readonly onDetach: (subscription: StreamSubscription<T>) => void,
    private readonly onRead: () => void = () => undefined,
  ) {}

  /**
   * Whether `unsubscribe()` (or `return()`) was called
   */
  get isDetached(): boolean {
    return this.detached
  }

  /**
   * Values received but not yet read
   */
  get bufferedCount(): number {
    return this.buffer.length
  }

  /** @internal */
  push(value: T): void {
    if (this.ended) return

    const read = this.pending.shift()
    if (read) {
      read.resolve({ value, done: false })
    } else {
      this.buffer.push(value)
    }
  }

  /** @internal */
  end(): void {
    this.ended = true
    for (const read of this.pending.splice(0)) {
      read.resolve({ value: undefined, done: true })
    }
  }

  /** @internal */
  fail(error: Error): void {
    if (this.ended) return
    this.ended = true

    if (this.pending.length === 0) {
      this.failure = error
      return
    }
    for (const read of this.pending.splice(0)) {
      read.reject(error)
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1)
      this.onRead()
      return Promise.resolve({ value, done: false })
    }

    if (this.failure) {
      const error = this.failure
      this.failure = null
      return Promise.reject(error)
    }

    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true })
    }

    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject })
    })
  }

  /**
   * Called by `for await` on `break`; detaches the subscription
   */
  return(): Promise<IteratorResult<T>> {
    this.unsubscribe()
    return Promise.resolve({ value: undefined, done: true })
  }

  /**
   * Stop receiving values. The last subscription to detach cancels the
   * upstream call.
   */
  unsubscribe(): void {
    if (this.detached) return
    this.detached = true

    this.buffer.length = 0
    this.end()
    this.onDetach(this)
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this
  }
}

/**
 * BroadcastStream shares one server-streaming call between any number of
 * subscribers.
 *
 * The upstream is read from the first subscription on; each subscriber
 * receives the values pushed after it attached. Upstream errors reach
 * every attached subscriber. When the last subscriber detaches, or on
 * `cancel()`, the upstream call is cancelled, once.
 *
 * Reading is paused while any subscriber holds `maxBuffered` unread
 * values, so the slowest subscriber sets the pace for all of them.
 *
 * @example
 * ```typescript
 * const logs = client.tailLogs(part)
 *
 * for await (const batch of logs) {
 *   for (const entry of batch) console.log(entry.message)
 *   if (done) break // cancels the call if nobody else is listening
 * }
 * ```
 */
export class BroadcastStream<TSource, T> implements AsyncIterable<T> {
  private readonly subscribers = new Set<StreamSubscription<T>>()
  private readonly label: string
  private readonly logger: Logger
  private readonly maxBuffered: number
  private listening = false
  private paused = false
  private closed = false
  private cancelled = false
  private failure: Error | null = null

  constructor(
    private readonly upstream: grpc.ClientReadableStream<TSource>,
    private readonly project: (message: TSource) => T,
    options: BroadcastStreamOptions = {},
  ) {
    this.label = options.label ?? "stream"
    this.logger = options.logger ?? createLogger()
    this.maxBuffered = options.maxBuffered ?? DEFAULT_MAX_BUFFERED

    // Errors may arrive before anyone subscribes; "data" is attached
    // later so the upstream stays paused until then.
    this.upstream.on("error", this.handleError)
    this.upstream.on("end", this.handleEnd)
  }

  /**
   * Number of attached subscribers
   */
  get subscriberCount(): number {
    return this.subscribers.size
  }

  /**
   * Whether the upstream ended, failed or was cancelled
   */
  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Whether reading is held back by a subscriber's full buffer
   */
  get isPaused(): boolean {
    return this.paused
  }

  /**
   * Attach a new subscriber
   *
   * On a closed stream the subscription finishes immediately, or fails
   * with the upstream error if the stream failed.
   */
  subscribe(): StreamSubscription<T> {
    const subscription = new StreamSubscription<T>(
      (s) => this.detach(s),
      () => this.resumeIfDrained(),
    )

    if (this.closed) {
      if (this.failure) {
        subscription.fail(this.failure)
      } else {
        subscription.end()
      }
      return subscription
    }

    this.subscribers.add(subscription)
    this.logger.debug(
      `${this.label}: subscriber attached (${this.subscribers.size} active)`,
    )

    if (!this.listening) {
      this.listening = true
      this.upstream.on("data", this.handleData)
    }
    return subscription
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.subscribe()
  }

  /**
   * Cancel the upstream call and finish every subscriber
   *
   * Releases a stream nobody subscribed to; does nothing once closed.
   */
  cancel(): void {
    if (this.closed) return

    for (const subscription of this.subscribers) {
      subscription.end()
    }
    this.subscribers.clear()
    this.cancelUpstream()
  }

  private detach(subscription: StreamSubscription<T>): void {
    if (!this.subscribers.delete(subscription)) return

    this.logger.debug(
      `${this.label}: subscriber detached (${this.subscribers.size} active)`,
    )

    if (this.subscribers.size === 0 && !this.closed) {
      this.cancelUpstream()
    } else {
      this.resumeIfDrained()
    }
  }

  private cancelUpstream(): void {
    this.closed = true
    this.cancelled = true
    this.logger.debug(`${this.label}: cancelling upstream`)
    this.upstream.cancel()
  }

  private fullest(): number {
    let count = 0
    for (const subscription of this.subscribers) {
      count = Math.max(count, subscription.bufferedCount)
    }
    return count
  }

  private resumeIfDrained(): void {
    if (!this.paused || this.closed) return
    if (this.fullest() >= this.maxBuffered) return

    this.paused = false
    this.logger.debug(`${this.label}: resuming upstream`)
    this.upstream.resume()
  }

  private readonly handleData = (message: TSource): void => {
    const value = this.project(message)
    for (const subscription of this.subscribers) {
      subscription.push(value)
    }

    const buffered = this.fullest()
    if (!this.paused && buffered >= this.maxBuffered) {
      this.paused = true
      this.logger.debug(`${this.label}: pausing upstream (${buffered} buffered)`)
      this.upstream.pause()
    }
  }

  private readonly handleEnd = (): void => {
    if (this.closed) return
    this.closed = true

    this.logger.debug(`${this.label}: upstream ended`)
    for (const subscription of this.subscribers) {
      subscription.end()
    }
    this.subscribers.clear()
  }

  private readonly handleError = (error: Error): void => {
    if (this.cancelled && isCancellation(error)) {
      this.logger.debug(`${this.label}: upstream cancelled`)
      return
    }
    if (this.closed) {
      this.logger.debug(`${this.label}: error after close: ${error.message}`)
      return
    }

    this.closed = true
    this.failure = error
    this.logger.debug(`${this.label}: upstream failed: ${error.message}`)
    for (const subscription of this.subscribers) {
      subscription.fail(error)
    }
    this.subscribers.clear()
  }
}

function isCancellation(error: Error): boolean {
  return "code" in error && error.code === grpc.status.CANCELLED
}
