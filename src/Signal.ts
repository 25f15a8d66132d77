/**
 * Multicast notification with idempotent subscription.
 *
 * Adding a listener that is already present, or removing one that is not,
 * does nothing. Listeners run in the order they were added; one that throws
 * is logged and the rest still run.
 */

import createDebug from 'debug';

const debug = createDebug('peerlink:signal');

export type Listener<Args extends unknown[]> = (...args: Args) => void;

export class Signal<Args extends unknown[] = []> {
  private _listeners = new Set<Listener<Args>>();

  get size(): number {
    return this._listeners.size;
  }

  add(listener: Listener<Args>): void {
    this._listeners.add(listener);
  }

  remove(listener: Listener<Args>): boolean {
    return this._listeners.delete(listener);
  }

  has(listener: Listener<Args>): boolean {
    return this._listeners.has(listener);
  }

  clear(): void {
    this._listeners.clear();
  }

  invoke(...args: Args): void {
    // Listeners may add or remove listeners while running.
    for (const listener of [...this._listeners]) {
      try {
        listener(...args);
      } catch (err) {
        debug('listener failed: %o', err);
      }
    }
  }
}
