import { describe, expect, it } from 'vitest';
import { FingerprintIndex } from '../../src/application/services/FingerprintIndex.js';
import type { Statement } from '../../src/domain/entities/Statement.js';
import { InMemoryStorageAdapter } from '../../src/infrastructure/adapters/storage/InMemoryStorageAdapter.js';
import { fixedClock } from '../fixtures/collaborators.js';

describe('FingerprintIndex', () => {
  it('finds the statement that stored a fingerprint', async () => {
    const storage = new InMemoryStorageAdapter(fixedClock());
    await storage.createStatementWithTransactions({
      filenames: ['part-1.pdf', 'part-2.pdf'],
      issuer: 'Krungsri',
      cutoffDay: 12,
      fingerprints: ['aaa', 'bbb'],
      transactions: [],
    });
    const index = new FingerprintIndex(storage);

    expect(await index.findDuplicate('bbb')).toEqual({
      id: 1,
      filenames: ['part-1.pdf', 'part-2.pdf'],
      issuer: 'Krungsri',
      period: '2025-03',
      importedAt: '2025-03-15T10:00:00.000Z',
    });
    expect(await index.findDuplicate('ccc')).toBeNull();
    expect(await index.findDuplicate('')).toBeNull();
  });

  it('fingerprints content with SHA-256', () => {
    const index = new FingerprintIndex(new InMemoryStorageAdapter(fixedClock()));

    expect(index.fingerprint(Buffer.from('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  it('treats a failing lookup as no duplicate', async () => {
    class BrokenStorage extends InMemoryStorageAdapter {
      async listFingerprintSets(): Promise<Array<{ statement: Statement; fingerprints: string[] }>> {
        throw new Error('database is locked');
      }
    }

    expect(await new FingerprintIndex(new BrokenStorage(fixedClock())).findDuplicate('aaa')).toBeNull();
  });
});
