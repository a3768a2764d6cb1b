import { describe, it, expect } from 'vitest';
import { inferEnvironment, inferWorkloadRole } from '../../../src/ai/workload.js';

describe('inferEnvironment', () => {
  it('should read the environment tag with any key case', () => {
    expect(inferEnvironment({ name: 'vm-01', tags: { Environment: 'Prod' } })).toBe('production');
    expect(inferEnvironment({ name: 'vm-01', tags: { ENV: 'qa' } })).toBe('test');
    expect(inferEnvironment({ name: 'vm-01', tags: { stage: 'stg' } })).toBe('staging');
  });

  it('should prefer tags over the name', () => {
    expect(inferEnvironment({ name: 'dev-web-01', tags: { env: 'production' } })).toBe('production');
  });

  it('should fall back to name tokens', () => {
    expect(inferEnvironment({ name: 'app-dev01', tags: {} })).toBe('development');
    expect(inferEnvironment({ name: 'PRD_SQL_2', tags: {} })).toBe('production');
  });

  it('should ignore unrecognised tag values and names', () => {
    expect(inferEnvironment({ name: 'vm-blue-7', tags: { env: 'blue' } })).toBe('unknown');
  });
});

describe('inferWorkloadRole', () => {
  it.each([
    ['prod-sql-01', 'database'],
    ['web01', 'web'],
    ['aks-nodepool-3', 'container'],
    ['corp-dc-02', 'directory'],
    ['redis-cache', 'cache'],
    ['jenkins-agent', 'build'],
    ['vpn-gw', 'gateway'],
  ])('should classify %s as %s', (name, role) => {
    expect(inferWorkloadRole(name)).toBe(role);
  });

  it('should not match short keywords inside longer words', () => {
    expect(inferWorkloadRole('adams-box')).toBe('general');
  });

  it('should return general when nothing matches', () => {
    expect(inferWorkloadRole('vm-42')).toBe('general');
  });
});
