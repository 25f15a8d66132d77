/**
 * Utility functions.
 */

import { createHash } from 'crypto';
import type { Signal } from './Signal.ts';

/**
 * Wait for a signal to fire.
 *
 * @param signal - The signal to listen on
 * @param timeout - Timeout in milliseconds (default: 5000)
 * @returns Promise resolving to the signal's arguments
 */
export function waitFor<Args extends unknown[]>(signal: Signal<Args>, timeout = 5000): Promise<Args> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.remove(handler);
      reject(new Error('Timeout waiting for signal'));
    }, timeout);

    function handler(...args: Args) {
      clearTimeout(timer);
      signal.remove(handler);
      resolve(args);
    }

    signal.add(handler);
  });
}

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolve a connect address against a transport's scheme.
 * Accepts "host", "host:port" or a full URL ("tcp4://host:port").
 */
export function toUri(address: string | URL, scheme: string): URL {
  if (address instanceof URL) return address;
  if (address.includes('://')) return new URL(address);
  return new URL(`${scheme}://${address}`);
}

/**
 * Stable 32-bit type key for a message name: the first four bytes of its
 * SHA-256 digest, big-endian. Identical across processes and builds.
 */
export function stableTypeKey(name: string): number {
  return createHash('sha256').update(name, 'utf8').digest().readUInt32BE(0);
}
