import type { IQueue, InternalMessage } from './types.js'
import { errorMeta, makeLogger, type Logger } from '@fanout/logger'
import { v4 } from 'uuid'

type Consumer<T> = {
  id: string
  fn: (messageId: string, item: T) => Promise<void>
  busy: boolean
}

export class InMemoryQueue<T> implements IQueue<T> {
  private readonly logger: Logger

  private queue: Array<InternalMessage<T>> = []
  private inFlight = new Map<string, InternalMessage<T>>()
  private consumers: Array<Consumer<T>> = []
  private byMessageConsumer = new Map<string, string>() // msgId -> consumerId
  private closed = false
  private rrIndex = 0 // round-robin pointer
  private kicking = false // prevent re-entrant kick storms

  constructor(name = 'InMemoryQueue') {
    this.logger = makeLogger(name)
  }

  enqueue(item: T): string {
    this.ensureOpen()
    const messageId = v4()
    this.queue.push({ messageId, item })
    this.logger.trace(`enqueue -> queued=${this.queue.length} inflight=${this.inFlight.size}`, {
      messageId,
    })
    queueMicrotask(() => this.kick())
    return messageId
  }

  onMessage(callback: (messageId: string, item: T) => Promise<void>): string {
    this.ensureOpen()
    const id = v4()
    this.consumers.push({ id, fn: callback, busy: false })
    this.logger.debug(`consumer_added`, { consumerId: id, total: this.consumers.length })
    queueMicrotask(() => this.kick())
    return id
  }

  ack(messageId: string): void {
    if (!this.inFlight.has(messageId)) return
    this.inFlight.delete(messageId)
    this.byMessageConsumer.delete(messageId)
    this.logger.trace(`ack`, { messageId, queued: this.queue.length, inflight: this.inFlight.size })
  }

  nack(messageId: string, requeue: boolean): void {
    const entry = this.inFlight.get(messageId)
    if (!entry) return
    this.inFlight.delete(messageId)
    this.byMessageConsumer.delete(messageId)
    if (requeue && !this.closed) {
      this.queue.push(entry)
      this.logger.debug(`nack -> requeued`, { messageId })
      queueMicrotask(() => this.kick())
    } else {
      this.logger.debug(`nack -> dropped`, { messageId })
    }
  }

  size(): number {
    return this.queue.length + this.inFlight.size
  }

  drain(): T[] {
    const waiting = this.queue.map((m) => m.item)
    this.queue = []
    if (waiting.length > 0) this.logger.debug(`drained`, { count: waiting.length })
    return waiting
  }

  close(): T[] {
    const waiting = this.drain()
    this.closed = true
    this.consumers = []
    this.logger.debug(`closed`, { inflight: this.inFlight.size })
    return waiting
  }

  isClosed(): boolean {
    return this.closed
  }

  // ---- internals ----

  private ensureOpen() {
    if (this.closed) throw new Error('InMemoryQueue is closed')
  }

  private kick() {
    if (this.kicking || this.closed) return
    this.kicking = true

    try {
      while (this.queue.length > 0) {
        const consumer = this.nextAvailableConsumer()
        if (!consumer) break

        const next = this.queue.shift()
        if (!next) break
        this.inFlight.set(next.messageId, next)
        this.byMessageConsumer.set(next.messageId, consumer.id)
        consumer.busy = true

        this.logger.trace(`dispatch`, {
          to: consumer.id,
          messageId: next.messageId,
          queued: this.queue.length,
          inflight: this.inFlight.size,
        })

        // deliver asynchronously; when it unwinds, free the consumer and kick again
        void Promise.resolve()
          .then(() => consumer.fn(next.messageId, next.item))
          .catch((err: unknown) => {
            // a throwing consumer gets its message back at the tail of the queue
            this.logger.error(`consumer_error`, { messageId: next.messageId, ...errorMeta(err) })
            this.nack(next.messageId, true)
          })
          .finally(() => {
            consumer.busy = false
            queueMicrotask(() => this.kick())
          })
      }
    } finally {
      this.kicking = false
    }
  }

  private nextAvailableConsumer(): Consumer<T> | null {
    const n = this.consumers.length
    for (let i = 0; i < n; i++) {
      const idx = (this.rrIndex + i) % n
      const c = this.consumers[idx]
      if (!c.busy) {
        this.rrIndex = (idx + 1) % n
        return c
      }
    }
    return null
  }
}
