/**
 * TypedEmitter
 *
 * Minimal event registry keyed by an event map of payload types. Every event
 * carries exactly one payload object so listeners share one signature.
 */

export type Listener<P> = (payload: P) => void;

type ListenerRegistry<Events> = { [K in keyof Events]?: Set<Listener<Events[K]>> };

export class TypedEmitter<Events extends object> {
  private _listeners: ListenerRegistry<Events> = {};

  /** @returns A function that removes the listener */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const listeners = this._listeners[event] ?? new Set<Listener<Events[K]>>();
    listeners.add(listener);
    this._listeners[event] = listeners;
    return () => this.off(event, listener);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    this._listeners[event]?.delete(listener);
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this._listeners[event]?.size ?? 0;
  }

  protected _emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const listeners = this._listeners[event];
    if (!listeners) return;
    // Copy so a listener can unsubscribe itself mid-dispatch
    for (const listener of [...listeners]) {
      listener(payload);
    }
  }

  protected _removeAllListeners(): void {
    this._listeners = {};
  }
}
