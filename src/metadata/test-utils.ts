/**
 * In-process RemoteMetadataService stand-ins for tests.
 *
 * Every method is a `vi.fn()` spy resolving to a small fixture, so tests
 * can assert calls and queue failures with `vi.mocked(...)`.
 *
 * @module
 */

import { vi } from 'vitest';
import type {
  ExtendedBlock,
  FileStatus,
  LocatedBlock,
  RemoteMetadataService,
  Token,
} from './types.js';

export function makeFileStatus(path: string, overrides: Partial<FileStatus> = {}): FileStatus {
  return {
    path,
    length: 0,
    isDirectory: false,
    replication: 3,
    blockSize: 134_217_728,
    modificationTime: 1_700_000_000_000,
    accessTime: 1_700_000_000_000,
    permission: { mode: 0o644 },
    owner: 'tester',
    group: 'supergroup',
    fileId: 16_386,
    ...overrides,
  };
}

export function makeBlock(blockId = 1_073_741_825): ExtendedBlock {
  return { poolId: 'BP-test', blockId, generationStamp: 1001, numBytes: 0 };
}

export function makeToken(service = 'ha-cluster'): Token {
  return { identifier: 'id-placeholder', password: 'test-secret', kind: 'HDFS_DELEGATION_TOKEN', service };
}

export function makeLocatedBlock(block: ExtendedBlock = makeBlock()): LocatedBlock {
  return { block, offset: 0, locations: [], storageIds: [], corrupt: false, token: makeToken() };
}

/**
 * Create a metadata service whose every operation succeeds with a fixture.
 * `name` is echoed in results where a string fits, to tell endpoints apart.
 */
export function createMockMetadataService(name = 'mock'): RemoteMetadataService {
  return {
    getBlockLocations: vi.fn(async () => ({
      fileLength: 0,
      underConstruction: false,
      lastBlockComplete: true,
      blocks: [],
    })),
    create: vi.fn(async (src: string) => makeFileStatus(src)),
    append: vi.fn(async () => ({})),
    setReplication: vi.fn(async () => true),
    setPermission: vi.fn(async () => {}),
    setOwner: vi.fn(async () => {}),
    abandonBlock: vi.fn(async () => {}),
    addBlock: vi.fn(async () => makeLocatedBlock()),
    getAdditionalDatanode: vi.fn(async () => makeLocatedBlock()),
    complete: vi.fn(async () => true),
    reportBadBlocks: vi.fn(async () => {}),
    concat: vi.fn(async () => {}),
    rename: vi.fn(async () => true),
    truncate: vi.fn(async () => true),
    getLease: vi.fn(async () => {}),
    releaseLease: vi.fn(async () => {}),
    deleteFile: vi.fn(async () => true),
    mkdirs: vi.fn(async () => true),
    getListing: vi.fn(async () => ({ entries: [], hasMore: false })),
    renewLease: vi.fn(async () => {}),
    recoverLease: vi.fn(async () => true),
    getFsStats: vi.fn(async () => [1000, 400, 600, 0, 0, 0]),
    metaSave: vi.fn(async () => {}),
    getFileInfo: vi.fn(async (src: string) => makeFileStatus(src, { owner: name })),
    getFileLinkInfo: vi.fn(async (src: string) => makeFileStatus(src)),
    getContentSummary: vi.fn(async () => ({
      length: 0,
      fileCount: 0,
      directoryCount: 1,
      quota: -1,
      spaceConsumed: 0,
      spaceQuota: -1,
    })),
    setQuota: vi.fn(async () => {}),
    fsync: vi.fn(async () => {}),
    setTimes: vi.fn(async () => {}),
    createSymlink: vi.fn(async () => {}),
    getLinkTarget: vi.fn(async () => `/target-of-${name}`),
    updateBlockForPipeline: vi.fn(async (block: ExtendedBlock) => makeLocatedBlock(block)),
    updatePipeline: vi.fn(async () => {}),
    getDelegationToken: vi.fn(async () => makeToken()),
    renewDelegationToken: vi.fn(async () => 1_700_086_400_000),
    cancelDelegationToken: vi.fn(async () => {}),
    close: vi.fn(async () => {}),
  };
}
