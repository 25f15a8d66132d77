/**
 * NetworkManager mode transitions.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { NetworkManager } from '../src/NetworkManager.ts';
import { MemoryTransport, waitFor, waitUntil } from './helpers.ts';

describe('NetworkManager', () => {
  it('should start offline', () => {
    const manager = new NetworkManager();

    assert.strictEqual(manager.mode, 'offline');
    assert.strictEqual(manager.isNetworkActive, false);
  });

  it('should run server and local client together as host', async () => {
    const manager = new NetworkManager({ transport: new MemoryTransport() });
    let hostStarts = 0;
    manager.onStartHost.add(() => hostStarts++);

    await manager.startHost();

    assert.strictEqual(manager.mode, 'host');
    assert.strictEqual(manager.isNetworkActive, true);
    assert.strictEqual(manager.client.isLocalClient, true);
    assert.strictEqual(manager.server.numPlayers, 1);
    assert.strictEqual(hostStarts, 1);

    const clientDown = waitFor(manager.client.disconnected);
    manager.stopHost();
    await clientDown;
    await waitUntil(() => manager.server.numPlayers === 0);

    assert.strictEqual(manager.mode, 'offline');
  });

  it('should report server and client modes', async () => {
    const transport = new MemoryTransport();
    const host = new NetworkManager({ transport });
    const peer = new NetworkManager({ transport, pingIntervalMs: 0 });

    await host.startServer();
    assert.strictEqual(host.mode, 'server');

    await peer.startClient('localhost');
    assert.strictEqual(peer.mode, 'client');
    assert.strictEqual(host.server.numPlayers, 1);

    const clientDown = waitFor(peer.client.disconnected);
    peer.stopClient();
    await clientDown;
    host.stopServer();

    assert.strictEqual(peer.mode, 'offline');
    assert.strictEqual(host.mode, 'offline');
  });

  it('should fire onStopHost before tearing down', async () => {
    const manager = new NetworkManager({ transport: new MemoryTransport() });
    await manager.startHost();
    const modes: string[] = [];
    manager.onStopHost.add(() => modes.push(manager.mode));

    manager.stopHost();

    assert.deepStrictEqual(modes, ['host']);
    await waitFor(manager.client.disconnected);
  });
});
