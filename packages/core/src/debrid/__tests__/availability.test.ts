import { describe, it, expect } from 'vitest';
import {
  checkAvailability,
  createVersion,
  dedupeByHash,
  sortVersions,
} from '../availability.js';
import type { CacheLookup, FileGroup } from '../base.js';
import {
  HASH_A,
  HASH_B,
  HASH_C,
  fileEntry,
  makeCandidate,
} from '../../__tests__/fixtures.js';

class FakeLookup implements CacheLookup {
  readonly providerCode = 'RD';
  readonly calls: string[][] = [];

  constructor(private readonly groups: Map<string, FileGroup[]>) {}

  async checkAvailability(hashes: readonly string[]) {
    this.calls.push([...hashes]);
    return this.groups;
  }
}

describe('createVersion', () => {
  it('derives every aggregate from its files', () => {
    const version = createVersion([
      fileEntry({ id: '1', name: 'Show.S01E01.mkv', sizeGB: 1, season: 1, episode: 1 }),
      fileEntry({ id: '2', name: 'Show.S01E02.mkv', sizeGB: 1, season: 1, episode: 2 }),
      fileEntry({ id: '3', name: 'Show.S02E01.mkv', sizeGB: 2, season: 2, episode: 1 }),
      fileEntry({
        id: '4',
        name: 'Show.S03E01.srt',
        sizeGB: 0.5,
        isVideo: false,
        isSubtitle: true,
        season: 3,
        episode: 1,
      }),
    ]);

    expect(version.totalSizeGB).toBe(4.5);
    expect(version.videoCount).toBe(3);
    expect(version.subtitleCount).toBe(1);
    expect(version.episodeCount).toBe(3);
    expect(version.seasons).toEqual([1, 2]);
    expect(Object.isFrozen(version)).toBe(true);
  });

  it('does not count season 0 or episode 0', () => {
    const version = createVersion([
      fileEntry({ id: '1', name: 'Show.S01E01.mkv', season: 1, episode: 1 }),
      fileEntry({ id: '2', name: 'Show.S00E00.mkv', season: 0, episode: 0 }),
    ]);

    expect(version.videoCount).toBe(2);
    expect(version.episodeCount).toBe(1);
    expect(version.seasons).toEqual([1]);
  });
});

describe('sortVersions', () => {
  const one = createVersion([fileEntry({ id: 'one' })]);
  const oneWithExtras = createVersion([
    fileEntry({ id: 'one-extra' }),
    fileEntry({ id: 'nfo', name: 'info.nfo', isVideo: false }),
  ]);
  const two = createVersion([fileEntry({ id: 'a' }), fileEntry({ id: 'b' })]);

  it('prefers more videos, then a higher video share', () => {
    expect(sortVersions([oneWithExtras, one, two])).toEqual([two, one, oneWithExtras]);
  });

  it('keeps reported order on ties', () => {
    const same = createVersion([fileEntry({ id: 'same' })]);
    const firstIds = (versions: ReturnType<typeof sortVersions>) =>
      versions.map((version) => version.files[0]?.id);
    expect(firstIds(sortVersions([one, same]))).toEqual(['one', 'same']);
    expect(firstIds(sortVersions([same, one]))).toEqual(['same', 'one']);
  });
});

describe('dedupeByHash', () => {
  it('keeps the first occurrence of a hash', () => {
    const first = makeCandidate({ title: 'first', contentHash: HASH_A });
    const second = makeCandidate({ title: 'second', contentHash: HASH_A });
    const other = makeCandidate({ title: 'other', contentHash: HASH_B });
    expect(dedupeByHash([first, second, other])).toEqual([first, other]);
  });
});

describe('checkAvailability', () => {
  it('expands cached releases and drops the rest', async () => {
    const lookup = new FakeLookup(
      new Map<string, FileGroup[]>([
        [
          HASH_A,
          [
            {
              '1': { filename: 'Movie.mkv', filesize: 2e9 },
              '2': { filename: 'Movie.nfo', filesize: 1000 },
            },
            { '3': { filename: 'Movie.mkv', filesize: 2e9 } },
          ],
        ],
        [HASH_B, []],
      ])
    );

    const result = await checkAvailability(
      [
        makeCandidate({ title: 'A', contentHash: HASH_A, sizeGB: 9 }),
        makeCandidate({ title: 'A again', contentHash: HASH_A }),
        makeCandidate({ title: 'B', contentHash: HASH_B }),
        makeCandidate({ title: 'C', contentHash: HASH_C }),
      ],
      lookup
    );

    expect(lookup.calls).toEqual([[HASH_A, HASH_B, HASH_C]]);
    expect(result).toHaveLength(1);
    const [candidate] = result;
    expect(candidate?.title).toBe('A');
    expect(candidate?.versions.map((v) => v.files.map((f) => f.id))).toEqual([
      ['3'],
      ['1', '2'],
    ]);
    expect(candidate?.sizeGB).toBe(2);
    expect(candidate?.videoCount).toBe(1);
    expect(candidate?.episodeCount).toBe(0);
    expect(candidate?.cached).toEqual(['RD']);
  });

  it('does not call the lookup without candidates', async () => {
    const lookup = new FakeLookup(new Map());
    expect(await checkAvailability([], lookup)).toEqual([]);
    expect(lookup.calls).toEqual([]);
  });

  it('rejects when the lookup fails', async () => {
    const lookup: CacheLookup = {
      providerCode: 'RD',
      checkAvailability: () => Promise.reject(new Error('lookup down')),
    };
    await expect(
      checkAvailability([makeCandidate()], lookup)
    ).rejects.toThrow('lookup down');
  });
});
