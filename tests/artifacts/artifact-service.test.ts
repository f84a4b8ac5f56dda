import { ArtifactService, sha256Hex } from '../../src/artifacts/artifact-service';
import { DataPlanePublisher } from '../../src/data-plane/publisher';
import { jobTimeoutError } from '../../src/domain/errors';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';

const bytes = (text: string) => new TextEncoder().encode(text);
const text = (content: Uint8Array) => Buffer.from(content).toString('utf8');

function setup(now = new Date('2026-03-01T00:00:00.000Z')): { store: Store; publisher: DataPlanePublisher; service: ArtifactService } {
  const store = createMemoryStore();
  const publisher = new DataPlanePublisher(store);
  const service = new ArtifactService(store, publisher, { retentionDays: 5, now: () => now });
  return { store, publisher, service };
}

describe('ArtifactService', () => {
  describe('slots', () => {
    it('writes a slot with hashes and a retention deadline', async () => {
      const { service } = setup();

      const slot = await service.put(
        'run_1',
        { name: 'ubuntu-latest', callSite: 'build' },
        [{ path: 'marked-space', content: bytes('elf') }],
        'build/build[ubuntu-latest]',
      );

      expect(slot.slotId).toBe('build/ubuntu-latest');
      expect(slot.files[0]).toMatchObject({ path: 'marked-space', sizeBytes: 3, sha256: sha256Hex('elf') });
      expect(slot.createdAt).toBe('2026-03-01T00:00:00.000Z');
      expect(slot.expiresAt).toBe('2026-03-06T00:00:00.000Z');
    });

    it('rejects a second write to the same slot', async () => {
      const { service } = setup();
      await service.put('run_1', { name: 'linux' }, [{ path: 'a', content: bytes('1') }], 'build[linux]');

      await expect(service.put('run_1', { name: 'linux' }, [{ path: 'a', content: bytes('2') }], 'other'))
        .rejects.toMatchObject({ code: 'ARTIFACT.ALREADY_EXISTS', typedError: { runId: 'run_1', jobId: 'other' } });
      expect(text((await service.get('run_1', { name: 'linux' })).files[0]?.content ?? bytes(''))).toBe('1');
    });

    it('writes nothing once the writer has been aborted', async () => {
      const { service } = setup();
      const controller = new AbortController();
      controller.abort(jobTimeoutError('build[linux]', 1000));

      await expect(service.put('run_1', { name: 'linux' }, [{ path: 'a', content: bytes('1') }], 'build[linux]', controller.signal))
        .rejects.toMatchObject({ code: 'JOB.TIMEOUT' });
      expect(await service.list('run_1')).toEqual([]);
    });

    it('slots are scoped to their run', async () => {
      const { service } = setup();
      await service.put('run_1', { name: 'linux' }, [{ path: 'a', content: bytes('1') }], 'build');

      await expect(service.get('run_2', { name: 'linux' })).rejects.toMatchObject({
        code: 'ARTIFACT.NOT_FOUND',
        typedError: { runId: 'run_2', details: { slot: 'linux' } },
      });
    });

    it('publishes artifact.created without file contents', async () => {
      const { service, publisher } = setup();
      await service.put('run_1', { name: 'linux', matrixValue: 'x' }, [{ path: 'a', content: bytes('1') }], 'build');

      const [event] = await publisher.getEventsByRun('run_1', ['artifact.created']);

      expect(event?.jobId).toBe('build');
      expect(event?.payload).toEqual({ slot: 'linux@x', files: [{ path: 'a', sizeBytes: 1, sha256: sha256Hex('1') }] });
    });

    it('purges slots past retention', async () => {
      const { service } = setup();
      await service.put('run_1', { name: 'linux' }, [{ path: 'a', content: bytes('1') }], 'build');

      expect(await service.purgeExpired(new Date('2026-03-05T23:59:59.000Z'))).toBe(0);
      expect(await service.purgeExpired(new Date('2026-03-06T00:00:00.000Z'))).toBe(1);
      expect(await service.list('run_1')).toEqual([]);
    });
  });

  describe('cache', () => {
    it('restores an exact hit before a prefix match', async () => {
      const { service } = setup();
      await service.cacheSave('linux-cargo-aaa', [{ path: 'target/x', content: bytes('old') }]);
      await service.cacheSave('linux-cargo-bbb', [{ path: 'target/x', content: bytes('new') }]);

      const exact = await service.cacheRestore('linux-cargo-aaa', ['linux-cargo-']);
      const partial = await service.cacheRestore('linux-cargo-ccc', ['linux-cargo-']);
      const miss = await service.cacheRestore('windows-cargo-aaa', ['windows-cargo-']);

      expect(exact.hit).toBe('exact');
      expect(partial).toMatchObject({ hit: 'partial', matchedKey: 'linux-cargo-bbb' });
      expect(miss).toEqual({ hit: 'miss' });
    });

    it('does not overwrite an existing key', async () => {
      const { service } = setup();

      expect(await service.cacheSave('k', [{ path: 'a', content: bytes('1') }])).toBe('saved');
      expect(await service.cacheSave('k', [{ path: 'a', content: bytes('2') }])).toBe('exists');

      const restored = await service.cacheRestore('k');
      expect(restored.hit === 'exact' ? text(restored.entry.files[0]?.content ?? bytes('')) : null).toBe('1');
    });

    it('degrades store failures to a miss or a failed save', async () => {
      const { store, service } = setup();
      jest.spyOn(store.caches, 'get').mockRejectedValue(new Error('disk full'));
      jest.spyOn(store.caches, 'create').mockRejectedValue(new Error('disk full'));

      expect(await service.cacheRestore('k', ['k'])).toEqual({ hit: 'miss' });
      expect(await service.cacheSave('k', [])).toBe('failed');
    });
  });
});
