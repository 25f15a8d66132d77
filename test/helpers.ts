/**
 * Test utilities: an in-memory transport, shared message types and waits.
 */

import { Type } from 'typebox';
import { ConnectError } from '../src/errors.ts';
import { defineMessage } from '../src/messages.ts';
import { Signal } from '../src/Signal.ts';
import { createPipe } from '../src/transports/PipeConnection.ts';
import type { PipeOptions } from '../src/transports/PipeConnection.ts';
import type { Transport, TransportConnection } from '../src/transports/Transport.ts';

export { delay, waitFor } from '../src/helpers.ts';

export const ChatMessage = defineMessage('test.Chat', Type.Object({ text: Type.String() }));
export const CountMessage = defineMessage('test.Count', Type.Object({ n: Type.Integer() }));
export const BoomMessage = defineMessage('test.Boom', Type.Object({}));

/**
 * Transport that "dials" by creating a pipe and handing the far end to
 * whoever is listening on the same instance. Share one instance between a
 * server and its clients.
 */
export class MemoryTransport implements Transport {
  readonly scheme = ['memory'] as const;
  readonly connected = new Signal<[TransportConnection]>();
  readonly started = new Signal();

  listening = false;
  /** Every URI passed to `connect()`. */
  readonly dialed: URL[] = [];

  private _pipeOptions: PipeOptions;

  constructor(pipeOptions: PipeOptions = {}) {
    this._pipeOptions = pipeOptions;
  }

  async listen(): Promise<void> {
    this.listening = true;
    this.started.invoke();
  }

  async connect(uri: URL): Promise<TransportConnection> {
    this.dialed.push(uri);
    if (!this.listening) {
      throw new ConnectError(`Connection refused: ${uri.href}`);
    }
    const [clientEnd, serverEnd] = createPipe(this._pipeOptions);
    this.connected.invoke(serverEnd);
    return clientEnd;
  }

  async close(): Promise<void> {
    this.listening = false;
  }

  serverUri(): URL[] {
    return [new URL('memory://localhost')];
  }
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 2000)
 * @param pollInterval - How often to check condition in milliseconds (default: 5)
 */
export async function waitUntil(condition: () => boolean, timeout = 2000, pollInterval = 5): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, pollInterval));
  }
}
