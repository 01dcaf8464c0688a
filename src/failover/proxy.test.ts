import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { MetadataServiceProxy } from './proxy.js';
import { ClosedError, InvalidAddressError, RpcError, StandbyError } from './errors.js';
import type { EndpointFactory, MetadataServiceProxyConfig } from './types.js';
import { ConfigValidationError } from '../config/errors.js';
import { DEFAULT_SESSION_CONFIG } from '../config/loader.js';
import {
  createMockMetadataService,
  makeBlock,
  makeFileStatus,
  makeLocatedBlock,
  makeToken,
} from '../metadata/test-utils.js';
import { CreateFlag } from '../metadata/types.js';
import type { DatanodeInfo, RemoteMetadataService } from '../metadata/types.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

const keepOrder = (): number => 0.999999;

interface ProxyHarness {
  proxy: MetadataServiceProxy;
  services: Map<string, RemoteMetadataService>;
  createEndpoint: Mock<EndpointFactory>;
}

function setup(overrides: Partial<MetadataServiceProxyConfig> = {}): ProxyHarness {
  const services = new Map<string, RemoteMetadataService>();
  const createEndpoint = vi.fn<EndpointFactory>((ctx) => {
    const service = createMockMetadataService(ctx.address.host);
    services.set(ctx.address.raw, service);
    return service;
  });
  const proxy = new MetadataServiceProxy({
    addresses: ['nn1:8020', 'nn2:8020', 'nn3:8020'],
    tokenService: 'ha-cluster',
    config: { rpcMaxHaRetry: 4 },
    auth: { method: 'SIMPLE', user: 'tester' },
    createEndpoint,
    random: keepOrder,
    logger: silentLogger,
    ...overrides,
  });
  return { proxy, services, createEndpoint };
}

function serviceAt(harness: ProxyHarness, raw: string): RemoteMetadataService {
  const service = harness.services.get(raw);
  if (!service) {
    throw new Error(`no endpoint built for ${raw}`);
  }
  return service;
}

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), setLevel: vi.fn() };
}

const datanode: DatanodeInfo = {
  ipAddr: '10.0.0.5',
  hostName: 'dn5',
  datanodeId: 'dn-5',
  xferPort: 9866,
  infoPort: 9864,
  ipcPort: 9867,
  location: '/default-rack',
};

// ============================================================================
// Construction
// ============================================================================

describe('MetadataServiceProxy construction', () => {
  it('builds one endpoint per address with the resolved config', () => {
    const harness = setup();

    expect(harness.createEndpoint).toHaveBeenCalledTimes(3);
    expect(harness.createEndpoint.mock.calls[0][0]).toEqual({
      address: { host: 'nn1', port: '8020', raw: 'nn1:8020' },
      tokenService: 'ha-cluster',
      config: { ...DEFAULT_SESSION_CONFIG, rpcMaxHaRetry: 4 },
      auth: { method: 'SIMPLE', user: 'tester' },
    });
    expect(harness.proxy.tokenService).toBe('ha-cluster');
  });

  it('enables HA for several endpoints', () => {
    expect(setup().proxy.getHaConfig()).toEqual({ enabled: true, maxRetry: 4 });
  });

  it('disables HA for a single endpoint', () => {
    expect(setup({ addresses: ['nn1:8020'] }).proxy.getHaConfig()).toEqual({ enabled: false, maxRetry: 0 });
  });

  it('uses the default retry bound when none is configured', () => {
    expect(setup({ config: undefined }).proxy.getHaConfig()).toEqual({ enabled: true, maxRetry: 15 });
  });

  it('rejects a malformed address before building endpoints', () => {
    const createEndpoint = vi.fn<EndpointFactory>(() => createMockMetadataService());

    expect(() => setup({ addresses: ['nn1:8020', 'nn2'], createEndpoint })).toThrow(
      'Cannot create metadata service proxy, nn2 does not contain host or port',
    );
    expect(createEndpoint).not.toHaveBeenCalled();
  });

  it('rejects an empty address list', () => {
    expect(() => setup({ addresses: [] })).toThrow(InvalidAddressError);
  });

  it('rejects an out-of-range random source and closes what it built', () => {
    const built: RemoteMetadataService[] = [];
    const createEndpoint = vi.fn<EndpointFactory>((ctx) => {
      const service = createMockMetadataService(ctx.address.host);
      built.push(service);
      return service;
    });

    expect(() => setup({ createEndpoint, random: () => -0.5 })).toThrow(RangeError);
    expect(built).toHaveLength(3);
    for (const service of built) {
      expect(service.close).toHaveBeenCalledTimes(1);
    }
  });

  it('prints nothing at the default log level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    try {
      const proxy = new MetadataServiceProxy({
        addresses: ['nn1:8020', 'nn2:8020'],
        tokenService: 'ha-cluster',
        auth: { method: 'SIMPLE', user: 'tester' },
        createEndpoint: () => createMockMetadataService(),
        random: keepOrder,
      });
      expect(proxy.getHaConfig()).toEqual({ enabled: true, maxRetry: 15 });
      expect(info).not.toHaveBeenCalled();
    } finally {
      info.mockRestore();
    }
  });

  it('rejects an invalid session config', () => {
    expect(() => setup({ config: { rpcMaxHaRetry: -1 } })).toThrow(ConfigValidationError);
  });

  it('logs its initial state', () => {
    const logger = createMockLogger();
    setup({ logger });

    expect(logger.info).toHaveBeenCalledWith(
      'Metadata service proxy initialized with 3 endpoint(s) for ha-cluster, HA enabled (max retry 4), active: nn1:8020',
    );
  });
});

// ============================================================================
// Forwarding
// ============================================================================

describe('MetadataServiceProxy forwarding', () => {
  const block = makeBlock();
  const located = makeLocatedBlock(block);
  const token = makeToken();
  const perm = { mode: 0o755 };

  type Case = [keyof RemoteMetadataService, (p: RemoteMetadataService) => Promise<unknown>, unknown[]];

  const cases: Case[] = [
    ['getBlockLocations', (p) => p.getBlockLocations('/f', 0, 1024), ['/f', 0, 1024]],
    [
      'create',
      (p) => p.create('/f', perm, 'client-1', CreateFlag.CREATE | CreateFlag.OVERWRITE, true, 3, 1024),
      ['/f', perm, 'client-1', 3, true, 3, 1024],
    ],
    ['append', (p) => p.append('/f', 'client-1', CreateFlag.APPEND), ['/f', 'client-1', 4]],
    ['setReplication', (p) => p.setReplication('/f', 2), ['/f', 2]],
    ['setPermission', (p) => p.setPermission('/f', perm), ['/f', perm]],
    ['setOwner', (p) => p.setOwner('/f', 'alice', 'staff'), ['/f', 'alice', 'staff']],
    ['abandonBlock', (p) => p.abandonBlock(block, '/f', 'client-1', 7), [block, '/f', 'client-1', 7]],
    [
      'addBlock',
      (p) => p.addBlock('/f', 'client-1', undefined, [datanode], 7),
      ['/f', 'client-1', undefined, [datanode], 7],
    ],
    [
      'getAdditionalDatanode',
      (p) => p.getAdditionalDatanode('/f', block, [datanode], ['s1'], [], 1, 'client-1'),
      ['/f', block, [datanode], ['s1'], [], 1, 'client-1'],
    ],
    ['complete', (p) => p.complete('/f', 'client-1', block, 7), ['/f', 'client-1', block, 7]],
    ['reportBadBlocks', (p) => p.reportBadBlocks([located]), [[located]]],
    ['concat', (p) => p.concat('/t', ['/a', '/b']), ['/t', ['/a', '/b']]],
    ['rename', (p) => p.rename('/a', '/b'), ['/a', '/b']],
    ['truncate', (p) => p.truncate('/f', 10, 'client-1'), ['/f', 10, 'client-1']],
    ['getLease', (p) => p.getLease('/f', 'client-1'), ['/f', 'client-1']],
    ['releaseLease', (p) => p.releaseLease('/f', 'client-1'), ['/f', 'client-1']],
    ['deleteFile', (p) => p.deleteFile('/d', true), ['/d', true]],
    ['mkdirs', (p) => p.mkdirs('/d', perm, true), ['/d', perm, true]],
    ['getListing', (p) => p.getListing('/d', '', false), ['/d', '', false]],
    ['renewLease', (p) => p.renewLease('client-1'), ['client-1']],
    ['recoverLease', (p) => p.recoverLease('/f', 'client-1'), ['/f', 'client-1']],
    ['getFsStats', (p) => p.getFsStats(), []],
    ['metaSave', (p) => p.metaSave('meta.txt'), ['meta.txt']],
    ['getFileInfo', (p) => p.getFileInfo('/f'), ['/f']],
    ['getFileLinkInfo', (p) => p.getFileLinkInfo('/l'), ['/l']],
    ['getContentSummary', (p) => p.getContentSummary('/d'), ['/d']],
    ['setQuota', (p) => p.setQuota('/d', 100, 1024), ['/d', 100, 1024]],
    ['fsync', (p) => p.fsync('/f', 'client-1'), ['/f', 'client-1']],
    ['setTimes', (p) => p.setTimes('/f', 10, 20), ['/f', 10, 20]],
    ['createSymlink', (p) => p.createSymlink('/t', '/l', perm, false), ['/t', '/l', perm, false]],
    ['getLinkTarget', (p) => p.getLinkTarget('/l'), ['/l']],
    ['updateBlockForPipeline', (p) => p.updateBlockForPipeline(block, 'client-1'), [block, 'client-1']],
    [
      'updatePipeline',
      (p) => p.updatePipeline('client-1', block, makeBlock(2), [datanode], ['s1']),
      ['client-1', block, makeBlock(2), [datanode], ['s1']],
    ],
    ['getDelegationToken', (p) => p.getDelegationToken('yarn'), ['yarn']],
    ['renewDelegationToken', (p) => p.renewDelegationToken(token), [token]],
    ['cancelDelegationToken', (p) => p.cancelDelegationToken(token), [token]],
  ];

  it.each(cases)('%s forwards its arguments to the active endpoint', async (name, call, args) => {
    const harness = setup();
    const active = serviceAt(harness, 'nn1:8020');

    await call(harness.proxy);

    expect(active[name]).toHaveBeenCalledTimes(1);
    expect(active[name]).toHaveBeenCalledWith(...args);
    expect(serviceAt(harness, 'nn2:8020')[name]).not.toHaveBeenCalled();
  });

  it('returns the endpoint result unchanged', async () => {
    const harness = setup();

    await expect(harness.proxy.getFileInfo('/f')).resolves.toEqual(makeFileStatus('/f', { owner: 'nn1' }));
    await expect(harness.proxy.getLinkTarget('/l')).resolves.toBe('/target-of-nn1');
    await expect(harness.proxy.renewDelegationToken(token)).resolves.toBe(1_700_086_400_000);
  });

  it('passes domain errors through unchanged', async () => {
    const harness = setup();
    const notFound = new Error('File does not exist: /missing');
    vi.mocked(serviceAt(harness, 'nn1:8020').getFileInfo).mockRejectedValue(notFound);

    await expect(harness.proxy.getFileInfo('/missing')).rejects.toBe(notFound);
    expect(harness.proxy.getStats().totalFailovers).toBe(0);
  });
});

// ============================================================================
// Failover
// ============================================================================

describe('MetadataServiceProxy failover', () => {
  it('moves to the next endpoint when the active one is standby', async () => {
    const harness = setup();
    vi.mocked(serviceAt(harness, 'nn1:8020').getFileInfo).mockRejectedValue(new StandbyError());

    const status = await harness.proxy.getFileInfo('/f');

    expect(status.owner).toBe('nn2');
    expect(harness.proxy.getActiveEndpointAddress()).toBe('nn2:8020');
    expect(harness.proxy.getStats()).toEqual({
      totalCalls: 1,
      totalFailovers: 1,
      totalStandby: 1,
      totalFailoverErrors: 0,
      totalExhausted: 0,
      activeEndpoint: 'nn2:8020',
      endpointCount: 3,
    });
  });

  it('gives up with RpcError after the retry bound', async () => {
    const harness = setup({ config: { rpcMaxHaRetry: 2 } });
    for (const service of harness.services.values()) {
      vi.mocked(service.mkdirs).mockRejectedValue(new StandbyError());
    }

    const result = harness.proxy.mkdirs('/d', { mode: 0o755 }, true);

    await expect(result).rejects.toBeInstanceOf(RpcError);
    await expect(result).rejects.toMatchObject({ operation: 'mkdirs', attempts: 3 });
    expect(harness.proxy.getActiveEndpointAddress()).toBe('nn3:8020');
  });
});

// ============================================================================
// Close
// ============================================================================

describe('MetadataServiceProxy close', () => {
  it('closes every endpoint once', async () => {
    const harness = setup();

    await harness.proxy.close();
    await harness.proxy.close();

    for (const service of harness.services.values()) {
      expect(service.close).toHaveBeenCalledTimes(1);
    }
    expect(harness.proxy.getActiveEndpointAddress()).toBeNull();
    expect(harness.proxy.getStats()).toMatchObject({ activeEndpoint: null, endpointCount: 0 });
  });

  it('rejects operations after close', async () => {
    const harness = setup();
    await harness.proxy.close();

    await expect(harness.proxy.getFileInfo('/f')).rejects.toBeInstanceOf(ClosedError);
    expect(serviceAt(harness, 'nn1:8020').getFileInfo).not.toHaveBeenCalled();
  });

  it('logs endpoints that fail to close and still closes the rest', async () => {
    const logger = createMockLogger();
    const harness = setup({ logger });
    vi.mocked(serviceAt(harness, 'nn2:8020').close).mockRejectedValue(new Error('socket already closed'));

    await harness.proxy.close();

    expect(logger.warn).toHaveBeenCalledWith('Failed to close endpoint nn2:8020: socket already closed');
    expect(serviceAt(harness, 'nn3:8020').close).toHaveBeenCalledTimes(1);
  });
});
