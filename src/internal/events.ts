/**
 * Event Emitter
 *
 * Typed publish/subscribe used by the solver. A throwing handler is reported
 * on stderr and does not stop the other handlers or the search.
 */

type Handler<P> = (payload: P) => void

type HandlerTable<M> = { [K in keyof M]?: Handler<M[K]>[] }

export type Emitter<M> = {
  /** Returns false if any handler threw */
  emit<K extends keyof M>(event: K, payload: M[K]): boolean
  /** Returns an unsubscribe function */
  on<K extends keyof M>(event: K, handler: Handler<M[K]>): () => void
}

export function createEmitter<M>(): Emitter<M> {
  const handlers: HandlerTable<M> = {}

  function emit<K extends keyof M>(event: K, payload: M[K]): boolean {
    const list = handlers[event]
    if (!list) return true
    let hadErrors = false
    for (const handler of list) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${String(event)}':`, e) }
    }
    return !hadErrors
  }

  function on<K extends keyof M>(event: K, handler: Handler<M[K]>): () => void {
    const list = handlers[event] ?? []
    list.push(handler)
    handlers[event] = list
    return () => {
      handlers[event] = (handlers[event] ?? []).filter(h => h !== handler)
    }
  }

  return { emit, on }
}
