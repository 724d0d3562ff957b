import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  BUNDLED_PLANS_DIR,
  PlanLoader,
  expandHostPath,
  parsePlanDocument,
  splitCommand,
} from './plan-loader.js';
import { isDwnError } from './dwn-error.js';
import { configureLogging, resetLogging } from './logger.js';
import { ErrorCode } from '../types/errors.js';

const HOME = '/home/dev';

function parse(doc: unknown, fallbackName = 'tool') {
  return parsePlanDocument(doc, 'tool.yml', fallbackName, HOME);
}

function parseError(doc: unknown): string {
  try {
    parse(doc);
  } catch (err) {
    if (isDwnError(err) && err.code === ErrorCode.INVALID_PLAN) return err.message;
    throw err;
  }
  throw new Error('expected INVALID_PLAN');
}

// ---------------------------------------------------------------------------
// splitCommand / expandHostPath
// ---------------------------------------------------------------------------

describe('splitCommand', () => {
  it('splits on whitespace', () => {
    expect(splitCommand('  python -m   http.server 8000 ')).toEqual(['python', '-m', 'http.server', '8000']);
  });

  it('honors quotes and escapes', () => {
    expect(splitCommand(`sh -c "echo \\"hi\\" there" 'a b' c\\ d ""`)).toEqual([
      'sh',
      '-c',
      'echo "hi" there',
      'a b',
      'c d',
      '',
    ]);
  });

  it('rejects an unterminated quote', () => {
    expect(() => splitCommand(`echo 'oops`)).toThrow(`unterminated ' quote in command`);
  });
});

describe('expandHostPath', () => {
  it('expands a leading tilde', () => {
    expect(expandHostPath('~', HOME)).toBe('/home/dev');
    expect(expandHostPath('~/www', HOME)).toBe('/home/dev/www');
  });

  it('keeps absolute paths', () => {
    expect(expandHostPath('/srv/data/', HOME)).toBe('/srv/data');
  });
});

// ---------------------------------------------------------------------------
// parsePlanDocument
// ---------------------------------------------------------------------------

describe('parsePlanDocument', () => {
  it('fills defaults for a minimal plan', () => {
    const plan = parse({ image: 'nginx' });
    expect(plan).toEqual({
      name: 'tool',
      image: 'nginx:latest',
      command: [],
      mounts: [],
      staticPorts: [],
      environment: {},
      extraOptions: {},
      detach: false,
      tty: false,
      source: 'tool.yml',
    });
    expect(Object.isFrozen(plan)).toBe(true);
  });

  it('prefers the name in the document', () => {
    expect(parse({ name: 'web', image: 'nginx' }).name).toBe('web');
  });

  it('builds the image reference', () => {
    expect(parse({ image: 'redis', version: 7 }).image).toBe('redis:7');
    expect(parse({ image: 'nginx', version: 'alpine' }).image).toBe('nginx:alpine');
    expect(parse({ image: 'nginx:1.27' }).image).toBe('nginx:1.27');
    expect(parse({ image: 'localhost:5000/tool' }).image).toBe('localhost:5000/tool:latest');
    expect(parse({ image: 'alpine@sha256:0123' }).image).toBe('alpine@sha256:0123');
  });

  it('splits a command string and copies a command list', () => {
    expect(parse({ image: 'x', command: 'nmap -sV "my host"' }).command).toEqual(['nmap', '-sV', 'my host']);
    expect(parse({ image: 'x', command: ['redis-server', '--save', ''] }).command).toEqual([
      'redis-server',
      '--save',
      '',
    ]);
  });

  it('parses every port form', () => {
    const plan = parse({ image: 'x', ports: [{ '80': 8080 }, 6379, { '53/udp': 'auto', '443/tcp': 8443 }] });
    expect(plan.staticPorts).toEqual([
      { containerPort: 80, protocol: 'tcp', hostPort: 8080 },
      { containerPort: 6379, protocol: 'tcp', hostPort: 6379 },
      { containerPort: 53, protocol: 'udp', hostPort: 'auto' },
      { containerPort: 443, protocol: 'tcp', hostPort: 8443 },
    ]);
  });

  it('accepts a single port mapping without a list', () => {
    expect(parse({ image: 'x', ports: { '8000/tcp': 'auto' } }).staticPorts).toEqual([
      { containerPort: 8000, protocol: 'tcp', hostPort: 'auto' },
    ]);
  });

  it('expands volume host paths', () => {
    const plan = parse({
      image: 'x',
      volumes: { '~/www': { bind: '/www', mode: 'ro' }, '/srv/data': { bind: '/data' } },
    });
    expect(plan.mounts).toEqual([
      { hostPath: '/home/dev/www', containerPath: '/www', mode: 'ro' },
      { hostPath: '/srv/data', containerPath: '/data', mode: 'rw' },
    ]);
  });

  it('reads environment lists and maps', () => {
    expect(parse({ image: 'x', environment: ['TZ=UTC', 'OPTS=a=b'] }).environment).toEqual({
      TZ: 'UTC',
      OPTS: 'a=b',
    });
    expect(parse({ image: 'x', environment: { DEBUG: true, WORKERS: 4 } }).environment).toEqual({
      DEBUG: 'true',
      WORKERS: '4',
    });
  });

  it('keeps engine options and flags', () => {
    const plan = parse({ image: 'x', detach: true, tty: true, options: { memory: '256m', cap_add: ['NET_ADMIN'] } });
    expect(plan.detach).toBe(true);
    expect(plan.tty).toBe(true);
    expect(plan.extraOptions).toEqual({ memory: '256m', cap_add: ['NET_ADMIN'] });
  });

  it('tags images built from an inline dockerfile as dwnlocal', () => {
    const dockerfile = 'FROM alpine:3\nRUN apk add --no-cache curl\n';

    const plan = parse({ image: 'tools/curl', version: '8', dockerfile });
    expect(plan.image).toBe('tools/curl:dwnlocal');
    expect(plan.dockerfile).toBe(dockerfile);

    expect(parse({ image: 'registry:5000/tools/curl:1.2', dockerfile }).image).toBe('registry:5000/tools/curl:dwnlocal');
    expect(parse({ image: 'nginx' })).not.toHaveProperty('dockerfile');
  });

  it('rejects an inline dockerfile without a FROM instruction', () => {
    expect(parseError({ image: 'tools/curl', dockerfile: 'RUN apk add curl' })).toBe(
      'Invalid plan file tool.yml: dockerfile has no FROM instruction',
    );
  });

  it('rejects a document without an image', () => {
    expect(parseError({ name: 'x' })).toBe("Invalid plan file tool.yml: / must have required property 'image'");
  });

  it('rejects unknown keys', () => {
    expect(parseError({ image: 'x', bogus: 1 })).toBe(
      'Invalid plan file tool.yml: / must NOT have additional properties',
    );
  });

  it('rejects a host port exposed twice', () => {
    expect(parseError({ image: 'x', ports: [{ '80': 8080 }, { '81/udp': 8080 }] })).toBe(
      'Invalid plan file tool.yml: host port 8080 is exposed more than once',
    );
  });

  it('allows several auto ports', () => {
    expect(parse({ image: 'x', ports: { '80': 'auto', '81': 'auto' } }).staticPorts).toHaveLength(2);
  });

  it('rejects an out-of-range container port', () => {
    expect(parseError({ image: 'x', ports: { '70000': 8080 } })).toBe(
      'Invalid plan file tool.yml: container port 70000 is out of range',
    );
  });

  it('rejects an unterminated quote in the command', () => {
    expect(parseError({ image: 'x', command: `echo "hi` })).toBe(
      'Invalid plan file tool.yml: unterminated " quote in command',
    );
  });
});

// ---------------------------------------------------------------------------
// PlanLoader
// ---------------------------------------------------------------------------

describe('PlanLoader', () => {
  let root: string;
  let bundled: string;
  let user: string;

  beforeEach(() => {
    configureLogging({ sink: () => {} });
    root = mkdtempSync(join(tmpdir(), 'dwn-plans-'));
    bundled = join(root, 'bundled');
    user = join(root, 'user');
    mkdirSync(bundled);
    mkdirSync(user);
  });

  afterEach(() => {
    resetLogging();
    rmSync(root, { recursive: true, force: true });
  });

  it('loads plans and names them after their file by default', async () => {
    writeFileSync(join(bundled, 'nmap.yml'), 'image: instrumentisto/nmap\ncommand: -sV\n');
    writeFileSync(join(bundled, 'web.yaml'), 'name: web\nimage: nginx\nports:\n  - 80: 8080\n');
    writeFileSync(join(bundled, 'README.md'), '# not a plan\n');

    const loader = new PlanLoader({ dirs: [bundled], homeDir: HOME });
    await loader.load();

    expect(loader.validPlans().map((p) => p.name)).toEqual(['nmap', 'web']);
    expect(loader.getPlan('nmap').command).toEqual(['-sV']);
    expect(loader.getPlan('web').staticPorts).toEqual([{ containerPort: 80, protocol: 'tcp', hostPort: 8080 }]);
  });

  it('lets later directories override earlier ones', async () => {
    writeFileSync(join(bundled, 'nginx.yml'), 'image: nginx\n');
    writeFileSync(join(user, 'nginx.yml'), 'image: nginx\nversion: alpine\n');

    const loader = new PlanLoader({ dirs: [bundled, user], homeDir: HOME });
    await loader.load();

    expect(loader.getPlan('nginx').image).toBe('nginx:alpine');
    expect(loader.getPlan('nginx').source).toBe(join(user, 'nginx.yml'));
  });

  it('records invalid files without failing the load', async () => {
    writeFileSync(join(bundled, 'good.yml'), 'image: busybox\n');
    writeFileSync(join(bundled, 'broken.yml'), 'command: ls\n');
    writeFileSync(join(bundled, 'garbled.yml'), 'image: [unclosed\n');

    const loader = new PlanLoader({ dirs: [bundled], homeDir: HOME });
    await loader.load();

    expect(loader.validPlans().map((p) => p.name)).toEqual(['good']);
    expect(loader.invalidRecords().map((r) => r.name)).toEqual(['broken', 'garbled']);
    expect(loader.invalidRecords()[0].errors).toEqual([
      `Invalid plan file ${join(bundled, 'broken.yml')}: / must have required property 'image'`,
    ]);
    expect(loader.invalidRecords()[1].errors).toHaveLength(1);

    expect(() => loader.getPlan('broken')).toThrow(
      `Plan "broken" is invalid: Invalid plan file ${join(bundled, 'broken.yml')}: / must have required property 'image'`,
    );
  });

  it('skips empty documents and missing directories', async () => {
    writeFileSync(join(bundled, 'empty.yml'), '# nothing yet\n');

    const loader = new PlanLoader({ dirs: [join(root, 'missing'), bundled], homeDir: HOME });
    await loader.load();

    expect(loader.allRecords()).toEqual([]);
  });

  it('throws PLAN_NOT_FOUND for an unknown plan', async () => {
    const loader = new PlanLoader({ dirs: [bundled] });
    await loader.load();

    expect(() => loader.getPlan('nope')).toThrow('Unable to find plan "nope"');
    try {
      loader.getPlan('nope');
    } catch (err) {
      expect(isDwnError(err) && err.code).toBe(ErrorCode.PLAN_NOT_FOUND);
    }
  });

  it('loads the bundled plans', async () => {
    const loader = new PlanLoader({ dirs: [BUNDLED_PLANS_DIR], homeDir: HOME });
    await loader.load();

    expect(loader.invalidRecords()).toEqual([]);
    expect(loader.validPlans().map((p) => p.name)).toEqual(['http-server', 'nginx', 'nmap', 'redis']);
    expect(loader.getPlan('nginx').image).toBe('nginx:alpine');
    expect(loader.getPlan('nginx').mounts[0].hostPath).toBe('/home/dev/www');
    expect(loader.getPlan('redis').extraOptions).toEqual({ memory: '256m' });
  });
});
