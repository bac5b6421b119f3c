// Dispatch queue contract: producers enqueue, registered consumers pull one message at a time
export interface IQueue<T> {
  /**
   * Enqueue an item for the next idle consumer.
   * Returns a unique message ID for tracking.
   */
  enqueue(item: T): string

  /**
   * Register a consumer. Each consumer handles at most one message at a time.
   * Returns the consumer ID.
   */
  onMessage(callback: (messageId: string, item: T) => Promise<void>): string

  /**
   * Acknowledge successful processing of a message.
   * This removes the message from the queue permanently.
   */
  ack(messageId: string): void

  /**
   * Reject a message and optionally requeue it.
   * @param requeue Whether to put the message back in the queue
   */
  nack(messageId: string, requeue: boolean): void

  /**
   * Number of messages waiting plus in flight.
   */
  size(): number

  /**
   * Remove and return every message that has not been dispatched yet.
   */
  drain(): T[]

  /**
   * Stop dispatching. Returns the messages that were still waiting.
   */
  close(): T[]
}

export interface InternalMessage<T> {
  messageId: string
  item: T
}
