import { describe, expect, it } from 'vitest';
import { MemoryTaskStore, RemoteTaskStore } from '../store/index.js';
import type { PeerRecord } from '../types/index.js';
import { StorePeerDirectory, isHealthy } from './directory.js';

const NOW = new Date('2026-01-01T00:10:00.000Z');

function peer(id: string, overrides: Partial<PeerRecord> = {}): PeerRecord {
  return { id, status: 'online', lastSeen: '2026-01-01T00:09:30.000Z', load: 0, ...overrides };
}

describe('isHealthy', () => {
  it('requires an online peer seen within the TTL', () => {
    expect(isHealthy(peer('b'), 60, NOW)).toBe(true);
    expect(isHealthy(peer('b', { lastSeen: '2026-01-01T00:09:00.000Z' }), 60, NOW)).toBe(true);
    expect(isHealthy(peer('b', { lastSeen: '2026-01-01T00:08:59.999Z' }), 60, NOW)).toBe(false);
    expect(isHealthy(peer('b', { status: 'offline' }), 60, NOW)).toBe(false);
  });
});

describe('StorePeerDirectory', () => {
  async function directory(records: PeerRecord[], allowlist?: string[]) {
    const backend = new MemoryTaskStore();
    for (const r of records) await backend.heartbeat(r);
    return new StorePeerDirectory(new RemoteTaskStore(backend), 'machine-a', {
      ttlSeconds: 60,
      allowlist,
      now: () => NOW,
    });
  }

  it('lists healthy peers other than this machine with their load', async () => {
    const dir = await directory([
      peer('machine-a'),
      peer('machine-b', { load: 2 }),
      peer('machine-c', { status: 'offline' }),
      peer('machine-d', { lastSeen: '2026-01-01T00:00:00.000Z' }),
    ]);
    expect(await dir.listPeers()).toEqual([{ id: 'machine-b', load: 2 }]);
  });

  it('restricts candidates to the allowlist', async () => {
    const dir = await directory([peer('machine-b'), peer('machine-c')], ['machine-c']);
    expect(await dir.listPeers()).toEqual([{ id: 'machine-c', load: 0 }]);
  });
});
