import { describe, it, expect } from 'vitest';
import { createPlan, formatStaticPort, withExtraArgs } from './plan.js';

describe('createPlan', () => {
  it('fills defaults for everything but name and image', () => {
    expect(createPlan({ name: 'tool', image: 'busybox:latest' })).toEqual({
      name: 'tool',
      image: 'busybox:latest',
      command: [],
      mounts: [],
      staticPorts: [],
      environment: {},
      extraOptions: {},
      detach: false,
      tty: false,
    });
  });

  it('keeps the source only when given', () => {
    expect(createPlan({ name: 'tool', image: 'busybox:latest' })).not.toHaveProperty('source');
    expect(createPlan({ name: 'tool', image: 'busybox:latest', source: '/plans/tool.yml' }).source).toBe(
      '/plans/tool.yml',
    );
  });

  it('freezes the plan and its collections', () => {
    const plan = createPlan({
      name: 'web',
      image: 'nginx:alpine',
      command: ['nginx'],
      staticPorts: [{ containerPort: 80, protocol: 'tcp', hostPort: 8080 }],
    });

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.command)).toBe(true);
    expect(Object.isFrozen(plan.staticPorts[0])).toBe(true);
    expect(Object.isFrozen(plan.environment)).toBe(true);
  });

  it('copies its inputs', () => {
    const command = ['nmap'];
    const plan = createPlan({ name: 'nmap', image: 'instrumentisto/nmap:latest', command });
    command.push('-v');
    expect(plan.command).toEqual(['nmap']);
  });
});

describe('withExtraArgs', () => {
  const nmap = createPlan({
    name: 'nmap',
    image: 'instrumentisto/nmap:latest',
    command: ['nmap'],
    source: '/plans/nmap.yml',
  });

  it('appends the arguments to the command', () => {
    const plan = withExtraArgs(nmap, ['-p', '80', 'localhost']);
    expect(plan.command).toEqual(['nmap', '-p', '80', 'localhost']);
    expect(plan.source).toBe('/plans/nmap.yml');
    expect(nmap.command).toEqual(['nmap']);
  });

  it('returns the same plan when there is nothing to add', () => {
    expect(withExtraArgs(nmap, [])).toBe(nmap);
  });
});

describe('formatStaticPort', () => {
  it('renders host<-container/proto', () => {
    expect(formatStaticPort({ containerPort: 53, protocol: 'udp', hostPort: 5353 })).toBe('5353<-53/udp');
    expect(formatStaticPort({ containerPort: 8000, protocol: 'tcp', hostPort: 'auto' })).toBe('auto<-8000/tcp');
  });
});
