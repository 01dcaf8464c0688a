/**
 * Domain model of the filesystem metadata service.
 *
 * These types describe what a single NameNode endpoint accepts and
 * returns. The failover proxy forwards them unchanged.
 *
 * 64-bit protocol integers (lengths, block ids, timestamps) are carried
 * as `number`; values above 2^53 are not expected from a metadata service.
 *
 * @module
 */

// ============================================================================
// Value types
// ============================================================================

/** POSIX-style permission bits, e.g. `{ mode: 0o755 }`. */
export interface Permission {
  mode: number;
}

/**
 * Flags for {@link RemoteMetadataService.create} and
 * {@link RemoteMetadataService.append}, combined with `|`.
 */
export const CreateFlag = {
  CREATE: 0x01,
  OVERWRITE: 0x02,
  APPEND: 0x04,
  SYNC_BLOCK: 0x08,
  NEW_BLOCK: 0x20,
} as const;

export interface FileStatus {
  path: string;
  length: number;
  isDirectory: boolean;
  replication: number;
  blockSize: number;
  modificationTime: number;
  accessTime: number;
  permission: Permission;
  owner: string;
  group: string;
  /** Target path when the entry is a symbolic link */
  symlink?: string;
  fileId: number;
}

export interface DatanodeInfo {
  ipAddr: string;
  hostName: string;
  datanodeId: string;
  xferPort: number;
  infoPort: number;
  ipcPort: number;
  location?: string;
}

export interface ExtendedBlock {
  poolId: string;
  blockId: number;
  generationStamp: number;
  numBytes: number;
}

/** Delegation or block access token. Opaque to the client. */
export interface Token {
  identifier: string;
  password: string;
  kind: string;
  service: string;
}

export interface LocatedBlock {
  block: ExtendedBlock;
  offset: number;
  locations: DatanodeInfo[];
  storageIds: string[];
  corrupt: boolean;
  token: Token;
}

export interface LocatedBlocks {
  fileLength: number;
  underConstruction: boolean;
  lastBlockComplete: boolean;
  blocks: LocatedBlock[];
  lastBlock?: LocatedBlock;
}

export interface AppendResult {
  /** Last partial block to continue writing into, absent when block-aligned */
  lastBlock?: LocatedBlock;
  status?: FileStatus;
}

export interface DirectoryListing {
  entries: FileStatus[];
  /** More entries remain after the last one returned */
  hasMore: boolean;
}

export interface ContentSummary {
  length: number;
  fileCount: number;
  directoryCount: number;
  quota: number;
  spaceConsumed: number;
  spaceQuota: number;
}

/**
 * Filesystem-wide counters in protocol order. Index with {@link FsStatsIndex}.
 */
export type FsStats = number[];

export const FsStatsIndex = {
  CAPACITY: 0,
  USED: 1,
  REMAINING: 2,
  UNDER_REPLICATED: 3,
  CORRUPT_BLOCKS: 4,
  MISSING_BLOCKS: 5,
} as const;

// ============================================================================
// Credentials
// ============================================================================

export type AuthMethod = 'SIMPLE' | 'KERBEROS' | 'TOKEN';

/**
 * Credentials handed to every endpoint unchanged.
 */
export interface RpcAuth {
  method: AuthMethod;
  user: string;
  token?: Token;
}

// ============================================================================
// Service interface
// ============================================================================

/**
 * The full operation set of one metadata-service endpoint.
 *
 * Implementations reject with `StandbyError` when the endpoint is not
 * active, `FailoverError` on channel failures, and any other error for
 * domain failures.
 */
export interface RemoteMetadataService {
  getBlockLocations(src: string, offset: number, length: number): Promise<LocatedBlocks>;
  create(
    src: string,
    masked: Permission,
    clientName: string,
    flag: number,
    createParent: boolean,
    replication: number,
    blockSize: number,
  ): Promise<FileStatus>;
  append(src: string, clientName: string, flag: number): Promise<AppendResult>;
  setReplication(src: string, replication: number): Promise<boolean>;
  setPermission(src: string, permission: Permission): Promise<void>;
  setOwner(src: string, username: string, groupname: string): Promise<void>;
  abandonBlock(block: ExtendedBlock, src: string, holder: string, fileId: number): Promise<void>;
  addBlock(
    src: string,
    clientName: string,
    previous: ExtendedBlock | undefined,
    excludeNodes: DatanodeInfo[],
    fileId: number,
  ): Promise<LocatedBlock>;
  getAdditionalDatanode(
    src: string,
    block: ExtendedBlock,
    existings: DatanodeInfo[],
    storageIds: string[],
    excludes: DatanodeInfo[],
    numAdditionalNodes: number,
    clientName: string,
  ): Promise<LocatedBlock>;
  complete(src: string, clientName: string, last: ExtendedBlock | undefined, fileId: number): Promise<boolean>;
  reportBadBlocks(blocks: LocatedBlock[]): Promise<void>;
  concat(target: string, srcs: string[]): Promise<void>;
  rename(src: string, dst: string): Promise<boolean>;
  truncate(src: string, size: number, clientName: string): Promise<boolean>;
  getLease(src: string, clientName: string): Promise<void>;
  releaseLease(src: string, clientName: string): Promise<void>;
  deleteFile(src: string, recursive: boolean): Promise<boolean>;
  mkdirs(src: string, masked: Permission, createParent: boolean): Promise<boolean>;
  getListing(src: string, startAfter: string, needLocation: boolean): Promise<DirectoryListing>;
  renewLease(clientName: string): Promise<void>;
  recoverLease(src: string, clientName: string): Promise<boolean>;
  getFsStats(): Promise<FsStats>;
  metaSave(filename: string): Promise<void>;
  getFileInfo(src: string): Promise<FileStatus>;
  getFileLinkInfo(src: string): Promise<FileStatus>;
  getContentSummary(path: string): Promise<ContentSummary>;
  setQuota(path: string, namespaceQuota: number, diskspaceQuota: number): Promise<void>;
  fsync(src: string, clientName: string): Promise<void>;
  setTimes(src: string, mtime: number, atime: number): Promise<void>;
  createSymlink(target: string, link: string, dirPermission: Permission, createParent: boolean): Promise<void>;
  getLinkTarget(path: string): Promise<string>;
  updateBlockForPipeline(block: ExtendedBlock, clientName: string): Promise<LocatedBlock>;
  updatePipeline(
    clientName: string,
    oldBlock: ExtendedBlock,
    newBlock: ExtendedBlock,
    newNodes: DatanodeInfo[],
    storageIds: string[],
  ): Promise<void>;
  getDelegationToken(renewer: string): Promise<Token>;
  renewDelegationToken(token: Token): Promise<number>;
  cancelDelegationToken(token: Token): Promise<void>;
  /** Release the endpoint's transport resources. */
  close(): Promise<void>;
}
