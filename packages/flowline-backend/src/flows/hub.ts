import { v4 as uuidv4 } from 'uuid'
import { Logger } from '../types'

/** Anything that can carry one text frame to an observer; `ws` sockets fit as-is. */
export interface ObserverSink {
  send(data: string, done: (err?: Error) => void): void
}

export interface Broadcaster {
  broadcast(payload: string): void
}

export interface HubOptions {
  /** Messages that may wait per observer before new ones are dropped. */
  queueSize?: number
  logger?: Logger
}

export interface ObserverStats {
  observerId: string
  queued: number
  dropped: number
}

interface Observer {
  id: string
  sink: ObserverSink
  queue: string[]
  inFlight: boolean
  dropped: number
}

export const DEFAULT_QUEUE_SIZE = 256

/**
 * Fans each payload out to every attached observer. Every observer owns a
 * bounded queue drained one frame at a time; a full queue drops the frame for
 * that observer only, so `broadcast` returns immediately whatever the
 * consumers are doing. Without observers a payload is simply discarded.
 */
export class Hub implements Broadcaster {
  private readonly observers = new Map<string, Observer>()
  private readonly queueSize: number
  private readonly logger?: Logger

  constructor(opts: HubOptions = {}) {
    this.queueSize = Math.max(1, opts.queueSize ?? DEFAULT_QUEUE_SIZE)
    this.logger = opts.logger
  }

  get size() {
    return this.observers.size
  }

  attach(sink: ObserverSink): string {
    const id = uuidv4()
    this.observers.set(id, { id, sink, queue: [], inFlight: false, dropped: 0 })
    this.logger?.info('[hub] observer attached', { observerId: id, observers: this.observers.size })
    return id
  }

  detach(observerId: string): boolean {
    const observer = this.observers.get(observerId)
    if (!observer) return false
    observer.queue.length = 0
    this.observers.delete(observerId)
    this.logger?.info('[hub] observer detached', { observerId, observers: this.observers.size })
    return true
  }

  broadcast(payload: string): void {
    // snapshot: a send callback may detach observers while we iterate
    for (const observer of Array.from(this.observers.values())) {
      this.enqueue(observer, payload)
    }
  }

  /** Sends to one observer through its queue, with the same drop policy as `broadcast`. */
  sendTo(observerId: string, payload: string): boolean {
    const observer = this.observers.get(observerId)
    if (!observer) return false
    return this.enqueue(observer, payload)
  }

  stats(): ObserverStats[] {
    return Array.from(this.observers.values()).map((o) => ({ observerId: o.id, queued: o.queue.length, dropped: o.dropped }))
  }

  close() {
    for (const id of Array.from(this.observers.keys())) this.detach(id)
  }

  private enqueue(observer: Observer, payload: string): boolean {
    if (observer.queue.length >= this.queueSize) {
      observer.dropped += 1
      this.logger?.debug?.('[hub] queue full, dropping message', { observerId: observer.id, dropped: observer.dropped })
      return false
    }
    observer.queue.push(payload)
    this.drain(observer)
    return true
  }

  private drain(observer: Observer) {
    if (observer.inFlight || !this.observers.has(observer.id)) return
    const next = observer.queue.shift()
    if (next === undefined) return
    observer.inFlight = true
    const done = (err?: Error) => {
      observer.inFlight = false
      if (err) {
        this.logger?.warn('[hub] delivery failed, detaching observer', { observerId: observer.id, error: err.message })
        this.detach(observer.id)
        return
      }
      this.drain(observer)
    }
    try {
      observer.sink.send(next, done)
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)))
    }
  }
}
