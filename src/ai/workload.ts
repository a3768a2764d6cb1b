/**
 * Heuristics that give the model context the inventory does not carry
 * explicitly: deployment environment and workload role.
 */

import type { InstanceDescriptor } from '../rightsizing/types.js';

export type Environment = 'production' | 'staging' | 'test' | 'development' | 'unknown';

const ENVIRONMENT_TAG_KEYS = ['environment', 'env', 'stage'];

const ENVIRONMENT_ALIASES = new Map<string, Environment>(Object.entries({
  prod: 'production',
  production: 'production',
  prd: 'production',
  live: 'production',
  stage: 'staging',
  staging: 'staging',
  stg: 'staging',
  preprod: 'staging',
  test: 'test',
  testing: 'test',
  tst: 'test',
  qa: 'test',
  uat: 'test',
  dev: 'development',
  development: 'development',
  sandbox: 'development',
} satisfies Record<string, Exclude<Environment, 'unknown'>>));

const ROLE_KEYWORDS: Array<[role: string, keywords: string[]]> = [
  ['database', ['sql', 'db', 'database', 'mysql', 'postgres', 'pg', 'mongo', 'oracle', 'cosmos']],
  ['web', ['web', 'iis', 'nginx', 'apache', 'app', 'frontend', 'www']],
  ['container', ['k8s', 'aks', 'node', 'kube', 'docker']],
  ['directory', ['dc', 'ad', 'adds', 'ldap']],
  ['cache', ['redis', 'cache', 'memcached']],
  ['analytics', ['spark', 'hadoop', 'etl', 'bi', 'analytics']],
  ['build', ['build', 'ci', 'jenkins', 'runner']],
  ['file', ['file', 'fs', 'nfs', 'smb']],
  ['gateway', ['gw', 'gateway', 'proxy', 'vpn']],
];

function nameTokens(name: string): string[] {
  return name.toLowerCase().split(/[-_.\s]+/).filter(Boolean);
}

function environmentOf(value: string): Environment | undefined {
  return ENVIRONMENT_ALIASES.get(value.trim().toLowerCase());
}

/**
 * Environment from the `environment`/`env`/`stage` tag (any key case),
 * otherwise from tokens of the instance name.
 */
export function inferEnvironment(instance: Pick<InstanceDescriptor, 'name' | 'tags'>): Environment {
  for (const [key, value] of Object.entries(instance.tags)) {
    if (!ENVIRONMENT_TAG_KEYS.includes(key.toLowerCase())) continue;
    const env = environmentOf(value);
    if (env) return env;
  }

  for (const token of nameTokens(instance.name)) {
    const env = environmentOf(token.replace(/\d+$/, ''));
    if (env) return env;
  }

  return 'unknown';
}

function matchesKeyword(token: string, keyword: string): boolean {
  const bare = token.replace(/\d+$/, '');
  return bare === keyword || (keyword.length >= 3 && bare.startsWith(keyword));
}

/**
 * Workload role from name keywords ("prod-sql-01" -> database), or "general".
 */
export function inferWorkloadRole(name: string): string {
  const tokens = nameTokens(name);
  for (const [role, keywords] of ROLE_KEYWORDS) {
    if (tokens.some(token => keywords.some(keyword => matchesKeyword(token, keyword)))) {
      return role;
    }
  }
  return 'general';
}
