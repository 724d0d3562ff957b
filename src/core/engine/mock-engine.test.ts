import { describe, it, expect, beforeEach } from 'vitest';
import { getEventListeners } from 'node:events';
import { MockEngine } from './mock-engine.js';
import type { ContainerSpec, EngineClient } from './engine-client.js';
import { ErrorCode } from '../../types/errors.js';

function spec(name: string, overrides?: Partial<ContainerSpec>): ContainerSpec {
  return {
    name,
    image: 'nginx:alpine',
    command: [],
    env: {},
    labels: {},
    mounts: [],
    ports: [],
    tty: false,
    extraOptions: {},
    ...overrides,
  };
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of stream) lines.push(line);
  return lines;
}

describe('MockEngine', () => {
  let engine: MockEngine;

  beforeEach(() => {
    engine = new MockEngine();
  });

  it('implements the EngineClient interface', () => {
    const client: EngineClient = engine;
    expect(client.name).toBe('mock');
  });

  describe('containers', () => {
    it('creates containers with sequential ids and creation times', async () => {
      const a = await engine.createContainer(spec('a'));
      const b = await engine.createContainer(spec('b'));
      expect([a, b]).toEqual(['mock-1', 'mock-2']);

      const rows = await engine.listByLabels({});
      expect(rows.map((r) => r.createdAt)).toEqual(['2026-01-01T00:00:01.000Z', '2026-01-01T00:00:02.000Z']);
      expect(rows.map((r) => r.status)).toEqual(['created', 'created']);
    });

    it('rejects a duplicate name with NAME_CONFLICT', async () => {
      await engine.createContainer(spec('a'));
      await expect(engine.createContainer(spec('a'))).rejects.toMatchObject({
        code: ErrorCode.NAME_CONFLICT,
        message: 'The container name "/a" is already in use by container "mock-1"',
      });
    });

    it('rejects an unknown network', async () => {
      await expect(engine.createContainer(spec('a', { network: 'dwn' }))).rejects.toMatchObject({
        code: ErrorCode.ENGINE_ERROR,
        message: 'network dwn not found',
      });
    });

    it('publishes fixed and automatic ports on start', async () => {
      const id = await engine.createContainer(
        spec('a', {
          ports: [
            { containerPort: 80, protocol: 'tcp', hostPort: 8080 },
            { containerPort: 8000, protocol: 'tcp' },
          ],
        }),
      );
      await engine.start(id);

      expect((await engine.inspect(id)).publishedPorts).toEqual([
        { containerPort: 80, protocol: 'tcp', hostPort: 8080 },
        { containerPort: 8000, protocol: 'tcp', hostPort: 49153 },
      ]);
      expect(engine.connect(8080)).toEqual({ containerId: id, containerName: 'a', containerPort: 80 });
      expect(engine.connect(8080, 'udp')).toBeNull();
    });

    it('fails start with PORT_CONFLICT when a running container holds the port', async () => {
      const port = { containerPort: 80, protocol: 'tcp' as const, hostPort: 8080 };
      const first = await engine.createContainer(spec('a', { ports: [port] }));
      const second = await engine.createContainer(spec('b', { ports: [port] }));
      await engine.start(first);

      await expect(engine.start(second)).rejects.toMatchObject({
        code: ErrorCode.PORT_CONFLICT,
        message: 'Bind for 0.0.0.0:8080 failed: port is already allocated',
      });
      expect(engine.findByName('b')?.status).toBe('created');
    });

    it('assigns network addresses on start', async () => {
      await engine.createNetwork('dwn');
      const a = await engine.createContainer(spec('a', { network: 'dwn' }));
      const b = await engine.createContainer(spec('b', { network: 'dwn' }));
      await engine.start(a);
      await engine.start(b);

      expect((await engine.inspect(a)).networkAddresses).toEqual({ dwn: '172.20.0.2' });
      expect((await engine.inspect(b)).networkAddresses).toEqual({ dwn: '172.20.0.3' });
    });

    it('exits with 137 on a zero-timeout stop and records the call', async () => {
      const id = await engine.createContainer(spec('a'));
      await engine.start(id);
      await engine.stop(id, 0);

      const inspection = await engine.inspect(id);
      expect(inspection.status).toBe('exited');
      expect(inspection.exitCode).toBe(137);
      expect(engine.stopCalls).toEqual([{ containerId: id, timeoutSeconds: 0 }]);
    });

    it('refuses to remove a running container', async () => {
      const id = await engine.createContainer(spec('a'));
      await engine.start(id);
      await expect(engine.remove(id)).rejects.toMatchObject({ code: ErrorCode.ENGINE_ERROR });

      await engine.stop(id);
      await engine.remove(id);
      expect(engine.listAll()).toEqual([]);
    });

    it('reports CONTAINER_NOT_FOUND for unknown ids', async () => {
      await expect(engine.stop('mock-99')).rejects.toMatchObject({
        code: ErrorCode.CONTAINER_NOT_FOUND,
        message: 'No such container: mock-99',
      });
    });
  });

  describe('listByLabels', () => {
    it('matches every filter entry', async () => {
      await engine.createContainer(spec('a', { labels: { 'dwn.plan': 'nginx', 'dwn.role': 'primary' } }));
      await engine.createContainer(spec('b', { labels: { 'dwn.plan': 'nginx', 'dwn.role': 'port-forward' } }));
      await engine.createContainer(spec('c', { labels: { 'dwn.plan': 'redis', 'dwn.role': 'primary' } }));

      const rows = await engine.listByLabels({ 'dwn.plan': 'nginx', 'dwn.role': 'primary' });
      expect(rows.map((r) => r.name)).toEqual(['a']);
    });
  });

  describe('streamLogs', () => {
    it('replays scripted output and exits the container', async () => {
      engine.setImageBehavior('alpine:3', { logs: ['one', 'two'], exitCode: 3 });
      const id = await engine.createContainer(spec('a', { image: 'alpine:3' }));
      await engine.start(id);

      expect(await collect(engine.streamLogs(id))).toEqual(['one', 'two']);
      expect((await engine.inspect(id)).exitCode).toBe(3);
    });

    it('follows a long-running container until it stops', async () => {
      const id = await engine.createContainer(spec('a'));
      await engine.start(id);

      const done = collect(engine.streamLogs(id));
      await engine.stop(id);
      expect(await done).toEqual([]);
    });

    it('releases its abort listener once the container stops', async () => {
      const id = await engine.createContainer(spec('a'));
      await engine.start(id);
      const controller = new AbortController();

      const done = collect(engine.streamLogs(id, { signal: controller.signal }));
      expect(getEventListeners(controller.signal, 'abort')).toHaveLength(1);
      await engine.stop(id);

      expect(await done).toEqual([]);
      expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
    });

    it('ends when the caller aborts', async () => {
      const id = await engine.createContainer(spec('a'));
      await engine.start(id);
      const controller = new AbortController();

      const done = collect(engine.streamLogs(id, { signal: controller.signal }));
      controller.abort();
      expect(await done).toEqual([]);
      expect(engine.findByName('a')?.status).toBe('running');
    });
  });

  describe('networks and images', () => {
    it('tracks networks and built images', async () => {
      expect(await engine.networkExists('dwn')).toBe(false);
      await engine.createNetwork('dwn');
      expect(await engine.networkExists('dwn')).toBe(true);
      await expect(engine.createNetwork('dwn')).rejects.toMatchObject({
        message: 'network with name dwn already exists',
      });

      expect(await engine.imageExists('dwn-network:local')).toBe(false);
      await engine.buildImage({ contextDir: '/tmp', tag: 'dwn-network:local' });
      expect(await engine.imageExists('dwn-network:local')).toBe(true);
    });
  });

  describe('connect through a forwarder', () => {
    it('follows REMOTE_HOST and REMOTE_PORT to the target container', async () => {
      await engine.createNetwork('dwn');
      const target = await engine.createContainer(spec('app', { network: 'dwn' }));
      await engine.start(target);

      const forwarder = await engine.createContainer(
        spec('fwd', {
          network: 'dwn',
          env: { REMOTE_HOST: '172.20.0.2', REMOTE_PORT: '80' },
          ports: [{ containerPort: 9000, protocol: 'tcp', hostPort: 9000 }],
        }),
      );
      await engine.start(forwarder);

      expect(engine.connect(9000)).toEqual({ containerId: target, containerName: 'app', containerPort: 80 });

      await engine.stop(target);
      expect(engine.connect(9000)).toBeNull();
    });
  });

  describe('failure simulation', () => {
    it('fails once for the named container', async () => {
      const id = await engine.createContainer(spec('a'));
      engine.simulateFailure('start', 'a', ErrorCode.PORT_CONFLICT, 'busy');

      await expect(engine.start(id)).rejects.toMatchObject({ code: ErrorCode.PORT_CONFLICT, message: 'busy' });
      await engine.start(id);
      expect(engine.findByName('a')?.status).toBe('running');
    });

    it('makes every call fail while unreachable', async () => {
      engine.setReachable(false);
      expect(await engine.isAvailable()).toBe(false);
      await expect(engine.listByLabels({})).rejects.toMatchObject({ code: ErrorCode.ENGINE_UNREACHABLE });

      engine.reset();
      expect(await engine.isAvailable()).toBe(true);
    });

    it('simulates a crash and an out-of-band removal', async () => {
      const id = await engine.createContainer(spec('a'));
      await engine.start(id);
      engine.simulateExit(id, 2);
      expect((await engine.inspect(id)).exitCode).toBe(2);

      engine.simulateRemoval(id);
      expect(engine.findByName('a')).toBeUndefined();
    });
  });
});
