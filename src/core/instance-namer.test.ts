import { describe, it, expect } from 'vitest';
import {
  InstanceNamer,
  PRIMARY,
  describeRole,
  isSessionToken,
  mintSessionToken,
  portForwardRole,
  roleFromLabels,
  LABEL_ROLE,
  LABEL_FORWARD_PROTOCOL,
} from './instance-namer.js';

const namer = new InstanceNamer('dwn');
const forward = portForwardRole(80, 'tcp', 9000, '1a2b3c4d');

describe('session tokens', () => {
  it('mints 8 lowercase hex characters', () => {
    const token = mintSessionToken();
    expect(token).toMatch(/^[0-9a-f]{8}$/);
    expect(isSessionToken(token)).toBe(true);
  });

  it('mints distinct tokens', () => {
    const tokens = new Set(Array.from({ length: 50 }, () => mintSessionToken()));
    expect(tokens.size).toBe(50);
  });

  it('rejects malformed tokens', () => {
    expect(isSessionToken('1A2B3C4D')).toBe(false);
    expect(isSessionToken('1a2b3c4')).toBe(false);
    expect(isSessionToken('zzzzzzzz')).toBe(false);
  });
});

describe('InstanceNamer', () => {
  describe('nameFor', () => {
    it('names a primary <namespace>_<session>_<plan>', () => {
      expect(namer.nameFor('nginx', '1a2b3c4d', PRIMARY)).toBe('dwn_1a2b3c4d_nginx');
    });

    it('appends the port pair for a forwarder', () => {
      expect(namer.nameFor('nginx', 'deadbeef', forward)).toBe('dwn_deadbeef_nginx_net_80_9000');
    });

    it('uses the configured namespace', () => {
      expect(new InstanceNamer('lab').nameFor('redis', '00000000', PRIMARY)).toBe('lab_00000000_redis');
    });
  });

  describe('labelsFor', () => {
    it('labels a primary', () => {
      expect(namer.labelsFor('nginx', '1a2b3c4d', PRIMARY)).toEqual({
        'dwn.managed': 'true',
        'dwn.namespace': 'dwn',
        'dwn.plan': 'nginx',
        'dwn.session': '1a2b3c4d',
        'dwn.role': 'primary',
      });
    });

    it('labels a forwarder with its binding', () => {
      expect(namer.labelsFor('nginx', 'deadbeef', forward)).toEqual({
        'dwn.managed': 'true',
        'dwn.namespace': 'dwn',
        'dwn.plan': 'nginx',
        'dwn.session': 'deadbeef',
        'dwn.role': 'port-forward',
        'dwn.forward.container-port': '80',
        'dwn.forward.protocol': 'tcp',
        'dwn.forward.host-port': '9000',
        'dwn.forward.target-session': '1a2b3c4d',
      });
    });
  });

  describe('filters', () => {
    it('narrows from namespace to plan to binding', () => {
      expect(namer.namespaceFilter()).toEqual({ 'dwn.managed': 'true', 'dwn.namespace': 'dwn' });
      expect(namer.planFilter('nginx')).toEqual({
        'dwn.managed': 'true',
        'dwn.namespace': 'dwn',
        'dwn.plan': 'nginx',
      });
      expect(namer.bindingFilter('nginx', 9000)).toEqual({
        'dwn.managed': 'true',
        'dwn.namespace': 'dwn',
        'dwn.plan': 'nginx',
        'dwn.role': 'port-forward',
        'dwn.forward.host-port': '9000',
      });
    });
  });

  describe('identityFromLabels', () => {
    it('decodes what labelsFor wrote', () => {
      const labels = namer.labelsFor('nginx', 'deadbeef', forward);
      expect(namer.identityFromLabels(labels)).toEqual({
        planName: 'nginx',
        session: 'deadbeef',
        role: forward,
      });
    });

    it('ignores another namespace', () => {
      const labels = new InstanceNamer('other').labelsFor('nginx', '1a2b3c4d', PRIMARY);
      expect(namer.identityFromLabels(labels)).toBeNull();
    });

    it('returns null when the session label is missing', () => {
      const labels = namer.labelsFor('nginx', '1a2b3c4d', PRIMARY);
      delete labels['dwn.session'];
      expect(namer.identityFromLabels(labels)).toBeNull();
    });
  });

  describe('parseName', () => {
    it('parses a primary name', () => {
      expect(namer.parseName('dwn_1a2b3c4d_nginx')).toEqual({ session: '1a2b3c4d', planName: 'nginx' });
    });

    it('strips the leading slash engines report', () => {
      expect(namer.parseName('/dwn_1a2b3c4d_nginx')).toEqual({ session: '1a2b3c4d', planName: 'nginx' });
    });

    it('parses a forwarder name', () => {
      expect(namer.parseName('dwn_deadbeef_nginx_net_80_9000')).toEqual({
        session: 'deadbeef',
        planName: 'nginx',
        ports: { containerPort: 80, hostPort: 9000 },
      });
    });

    it('keeps underscores in plan names', () => {
      expect(namer.parseName('dwn_1a2b3c4d_my_tool')).toEqual({ session: '1a2b3c4d', planName: 'my_tool' });
    });

    it('rejects foreign and malformed names', () => {
      expect(namer.parseName('other_1a2b3c4d_nginx')).toBeNull();
      expect(namer.parseName('dwn_notatoken_nginx')).toBeNull();
      expect(namer.parseName('dwn_1a2b3c4d_')).toBeNull();
    });
  });
});

describe('roleFromLabels', () => {
  it('rejects an unknown role', () => {
    expect(roleFromLabels({ [LABEL_ROLE]: 'sidecar' })).toBeNull();
  });

  it('rejects a forwarder with a bad protocol', () => {
    const labels = { ...namer.labelsFor('nginx', 'deadbeef', forward), [LABEL_FORWARD_PROTOCOL]: 'sctp' };
    expect(roleFromLabels(labels)).toBeNull();
  });
});

describe('describeRole', () => {
  it('renders both roles', () => {
    expect(describeRole(PRIMARY)).toBe('primary');
    expect(describeRole(portForwardRole(53, 'udp', 5353, '1a2b3c4d'))).toBe('forward 5353->53/udp');
  });
});
