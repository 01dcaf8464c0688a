/**
 * MetadataServiceProxy — the metadata-service surface over a group of
 * redundant endpoints.
 *
 * Every operation runs once through the {@link RetryCoordinator} against
 * the endpoint currently believed active. Arguments, results and domain
 * errors are passed through unchanged; only placement and the number of
 * attempts differ from talking to a single endpoint.
 *
 * @example
 * ```typescript
 * const proxy = new MetadataServiceProxy({
 *   addresses: ['nn1.example.com:8020', 'nn2.example.com:8020'],
 *   tokenService: 'ha-cluster',
 *   config: { rpcMaxHaRetry: 4 },
 *   auth: { method: 'SIMPLE', user: 'etl' },
 *   createEndpoint: (ctx) => new RpcMetadataClient(ctx),
 * });
 *
 * const status = await proxy.getFileInfo('/warehouse/events');
 * await proxy.close();
 * ```
 *
 * @module
 */

import type {
  AppendResult,
  ContentSummary,
  DatanodeInfo,
  DirectoryListing,
  ExtendedBlock,
  FileStatus,
  FsStats,
  LocatedBlock,
  LocatedBlocks,
  Permission,
  RemoteMetadataService,
  Token,
} from '../metadata/types.js';
import { resolveSessionConfig } from '../config/loader.js';
import type { Logger } from '../utils/logger.js';
import { createLogger } from '../utils/logger.js';
import { getErrorMessage } from '../types/errors.js';
import { buildEndpointSet } from './endpoint-set.js';
import { ActivePointer } from './active-pointer.js';
import { RetryCoordinator } from './retry.js';
import type { FailoverStats, HAConfig, MetadataServiceProxyConfig } from './types.js';

export class MetadataServiceProxy implements RemoteMetadataService {
  public readonly tokenService: string;
  private readonly ha: HAConfig;
  private readonly pointer: ActivePointer;
  private readonly coordinator: RetryCoordinator;
  private readonly logger: Logger;

  /**
   * @throws {InvalidAddressError} if an address is not `host:port` or none is given
   * @throws {ConfigValidationError} if `config` fails validation
   */
  constructor(options: MetadataServiceProxyConfig) {
    const config = resolveSessionConfig(options.config);
    this.logger = options.logger ?? createLogger(config.logLevel);
    this.tokenService = options.tokenService;

    const { endpoints, ha } = buildEndpointSet(options.addresses, {
      tokenService: options.tokenService,
      config,
      auth: options.auth,
      createEndpoint: options.createEndpoint,
      random: options.random,
      logger: this.logger,
    });

    this.ha = ha;
    this.pointer = new ActivePointer(endpoints);
    this.coordinator = new RetryCoordinator(this.pointer, {
      ha,
      logger: this.logger,
      metrics: options.metrics,
    });

    this.logger.info(
      `Metadata service proxy initialized with ${endpoints.length} endpoint(s) for ${this.tokenService}, ` +
      `HA ${ha.enabled ? `enabled (max retry ${ha.maxRetry})` : 'disabled'}, active: ${endpoints.addresses()[0]}`,
    );
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  getHaConfig(): HAConfig {
    return { ...this.ha };
  }

  /** Address of the endpoint currently believed active, null once closed. */
  getActiveEndpointAddress(): string | null {
    return this.pointer.closed ? null : this.pointer.getActive().endpoint.address.raw;
  }

  getStats(): FailoverStats {
    return {
      ...this.coordinator.getStats(),
      activeEndpoint: this.getActiveEndpointAddress(),
      endpointCount: this.pointer.size,
    };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Release every endpoint. Later calls reject with `ClosedError`.
   * Idempotent.
   */
  async close(): Promise<void> {
    const removed = this.pointer.close();
    if (removed.length === 0) return;

    this.logger.info(`Metadata service proxy closed, releasing ${removed.length} endpoint(s)`);
    const results = await Promise.allSettled(removed.map((ep) => ep.service.close()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.warn(`Failed to close endpoint ${removed[i].address.raw}: ${getErrorMessage(result.reason)}`);
      }
    });
  }

  // ==========================================================================
  // Forwarded operations
  // ==========================================================================

  getBlockLocations(src: string, offset: number, length: number): Promise<LocatedBlocks> {
    return this.coordinator.run('getBlockLocations', (nn) => nn.getBlockLocations(src, offset, length));
  }

  create(
    src: string,
    masked: Permission,
    clientName: string,
    flag: number,
    createParent: boolean,
    replication: number,
    blockSize: number,
  ): Promise<FileStatus> {
    return this.coordinator.run('create', (nn) =>
      nn.create(src, masked, clientName, flag, createParent, replication, blockSize),
    );
  }

  append(src: string, clientName: string, flag: number): Promise<AppendResult> {
    return this.coordinator.run('append', (nn) => nn.append(src, clientName, flag));
  }

  setReplication(src: string, replication: number): Promise<boolean> {
    return this.coordinator.run('setReplication', (nn) => nn.setReplication(src, replication));
  }

  setPermission(src: string, permission: Permission): Promise<void> {
    return this.coordinator.run('setPermission', (nn) => nn.setPermission(src, permission));
  }

  setOwner(src: string, username: string, groupname: string): Promise<void> {
    return this.coordinator.run('setOwner', (nn) => nn.setOwner(src, username, groupname));
  }

  abandonBlock(block: ExtendedBlock, src: string, holder: string, fileId: number): Promise<void> {
    return this.coordinator.run('abandonBlock', (nn) => nn.abandonBlock(block, src, holder, fileId));
  }

  addBlock(
    src: string,
    clientName: string,
    previous: ExtendedBlock | undefined,
    excludeNodes: DatanodeInfo[],
    fileId: number,
  ): Promise<LocatedBlock> {
    return this.coordinator.run('addBlock', (nn) => nn.addBlock(src, clientName, previous, excludeNodes, fileId));
  }

  getAdditionalDatanode(
    src: string,
    block: ExtendedBlock,
    existings: DatanodeInfo[],
    storageIds: string[],
    excludes: DatanodeInfo[],
    numAdditionalNodes: number,
    clientName: string,
  ): Promise<LocatedBlock> {
    return this.coordinator.run('getAdditionalDatanode', (nn) =>
      nn.getAdditionalDatanode(src, block, existings, storageIds, excludes, numAdditionalNodes, clientName),
    );
  }

  complete(src: string, clientName: string, last: ExtendedBlock | undefined, fileId: number): Promise<boolean> {
    return this.coordinator.run('complete', (nn) => nn.complete(src, clientName, last, fileId));
  }

  reportBadBlocks(blocks: LocatedBlock[]): Promise<void> {
    return this.coordinator.run('reportBadBlocks', (nn) => nn.reportBadBlocks(blocks));
  }

  concat(target: string, srcs: string[]): Promise<void> {
    return this.coordinator.run('concat', (nn) => nn.concat(target, srcs));
  }

  rename(src: string, dst: string): Promise<boolean> {
    return this.coordinator.run('rename', (nn) => nn.rename(src, dst));
  }

  truncate(src: string, size: number, clientName: string): Promise<boolean> {
    return this.coordinator.run('truncate', (nn) => nn.truncate(src, size, clientName));
  }

  getLease(src: string, clientName: string): Promise<void> {
    return this.coordinator.run('getLease', (nn) => nn.getLease(src, clientName));
  }

  releaseLease(src: string, clientName: string): Promise<void> {
    return this.coordinator.run('releaseLease', (nn) => nn.releaseLease(src, clientName));
  }

  deleteFile(src: string, recursive: boolean): Promise<boolean> {
    return this.coordinator.run('deleteFile', (nn) => nn.deleteFile(src, recursive));
  }

  mkdirs(src: string, masked: Permission, createParent: boolean): Promise<boolean> {
    return this.coordinator.run('mkdirs', (nn) => nn.mkdirs(src, masked, createParent));
  }

  getListing(src: string, startAfter: string, needLocation: boolean): Promise<DirectoryListing> {
    return this.coordinator.run('getListing', (nn) => nn.getListing(src, startAfter, needLocation));
  }

  renewLease(clientName: string): Promise<void> {
    return this.coordinator.run('renewLease', (nn) => nn.renewLease(clientName));
  }

  recoverLease(src: string, clientName: string): Promise<boolean> {
    return this.coordinator.run('recoverLease', (nn) => nn.recoverLease(src, clientName));
  }

  getFsStats(): Promise<FsStats> {
    return this.coordinator.run('getFsStats', (nn) => nn.getFsStats());
  }

  metaSave(filename: string): Promise<void> {
    return this.coordinator.run('metaSave', (nn) => nn.metaSave(filename));
  }

  getFileInfo(src: string): Promise<FileStatus> {
    return this.coordinator.run('getFileInfo', (nn) => nn.getFileInfo(src));
  }

  getFileLinkInfo(src: string): Promise<FileStatus> {
    return this.coordinator.run('getFileLinkInfo', (nn) => nn.getFileLinkInfo(src));
  }

  getContentSummary(path: string): Promise<ContentSummary> {
    return this.coordinator.run('getContentSummary', (nn) => nn.getContentSummary(path));
  }

  setQuota(path: string, namespaceQuota: number, diskspaceQuota: number): Promise<void> {
    return this.coordinator.run('setQuota', (nn) => nn.setQuota(path, namespaceQuota, diskspaceQuota));
  }

  fsync(src: string, clientName: string): Promise<void> {
    return this.coordinator.run('fsync', (nn) => nn.fsync(src, clientName));
  }

  setTimes(src: string, mtime: number, atime: number): Promise<void> {
    return this.coordinator.run('setTimes', (nn) => nn.setTimes(src, mtime, atime));
  }

  createSymlink(target: string, link: string, dirPermission: Permission, createParent: boolean): Promise<void> {
    return this.coordinator.run('createSymlink', (nn) => nn.createSymlink(target, link, dirPermission, createParent));
  }

  getLinkTarget(path: string): Promise<string> {
    return this.coordinator.run('getLinkTarget', (nn) => nn.getLinkTarget(path));
  }

  updateBlockForPipeline(block: ExtendedBlock, clientName: string): Promise<LocatedBlock> {
    return this.coordinator.run('updateBlockForPipeline', (nn) => nn.updateBlockForPipeline(block, clientName));
  }

  updatePipeline(
    clientName: string,
    oldBlock: ExtendedBlock,
    newBlock: ExtendedBlock,
    newNodes: DatanodeInfo[],
    storageIds: string[],
  ): Promise<void> {
    return this.coordinator.run('updatePipeline', (nn) =>
      nn.updatePipeline(clientName, oldBlock, newBlock, newNodes, storageIds),
    );
  }

  getDelegationToken(renewer: string): Promise<Token> {
    return this.coordinator.run('getDelegationToken', (nn) => nn.getDelegationToken(renewer));
  }

  renewDelegationToken(token: Token): Promise<number> {
    return this.coordinator.run('renewDelegationToken', (nn) => nn.renewDelegationToken(token));
  }

  cancelDelegationToken(token: Token): Promise<void> {
    return this.coordinator.run('cancelDelegationToken', (nn) => nn.cancelDelegationToken(token));
  }
}
