/**
 * Metadata service domain model.
 *
 * @module
 */

export type {
  Permission,
  FileStatus,
  DatanodeInfo,
  ExtendedBlock,
  Token,
  LocatedBlock,
  LocatedBlocks,
  AppendResult,
  DirectoryListing,
  ContentSummary,
  FsStats,
  AuthMethod,
  RpcAuth,
  RemoteMetadataService,
} from './types.js';

export { CreateFlag, FsStatsIndex } from './types.js';
