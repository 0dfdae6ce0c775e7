import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigFile } from '../../src/config/config-file.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('ConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'orgmirror-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string, at = dir): string {
    const file = join(at, 'orgmirror.yaml');
    writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('finds the nearest config walking up', () => {
    const file = writeConfig('root: mirror\n');
    const nested = join(dir, 'a', 'b');
    mkdirSync(nested, { recursive: true });
    expect(ConfigFile.find(nested, {})).toBe(file);
  });

  it('prefers the environment override', () => {
    expect(ConfigFile.find(dir, { ORGMIRROR_CONFIG: 'custom.yaml' })).toBe(join(dir, 'custom.yaml'));
  });

  it('uses defaults when no file exists', () => {
    const config = new ConfigFile(join(dir, 'missing.yaml'));
    expect(config.exists).toBe(false);
    expect(config.data).toEqual({
      root: '.',
      source: { kind: 'auto', token_env: 'GITHUB_TOKEN' },
      ignore_orgs: [],
      jobs: 0,
      recurse_submodules: false,
      create_org_dirs: false,
      git_timeout_ms: 0,
    });
  });

  it('reports invalid values with their path', () => {
    const file = writeConfig('jobs: -2\nsource:\n  kind: svn\n');
    let caught: unknown;
    try {
      new ConfigFile(file);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof Error ? caught.message : '').toContain('  jobs: ');
    expect(caught instanceof Error ? caught.message : '').toContain('  source.kind: ');
  });

  it('resolves the root relative to the file and flags relative to cwd', () => {
    const file = writeConfig('root: mirror\n');
    const config = new ConfigFile(file);
    expect(config.resolveRoot()).toBe(join(dir, 'mirror'));
    expect(config.resolveRoot('elsewhere', '/work')).toBe('/work/elsewhere');
  });

  it('merges flags over file values', () => {
    const file = writeConfig([
      'root: /srv/mirror',
      'source:',
      '  url: https://opendev.org/api/v1/repos/search',
      '  token_env: MIRROR_TOKEN',
      'ignore_orgs: [vendor]',
      'jobs: 4',
      'recurse_submodules: true',
      '',
    ].join('\n'));

    const options = new ConfigFile(file).toRunOptions(
      { jobs: 8, ignore: ['legacy', 'vendor'], deleteOnly: true },
      { MIRROR_TOKEN: 'test-token' },
      '/work',
    );

    expect(options).toEqual({
      root: '/srv/mirror',
      sourceUrl: 'https://opendev.org/api/v1/repos/search',
      sourceKind: 'auto',
      cloneBase: undefined,
      token: 'test-token',
      ignoredOrgs: new Set(['legacy', 'vendor']),
      concurrency: 8,
      recurseSubmodules: true,
      createOrgDirs: false,
      deleteOnly: true,
      assumeYes: false,
      gitTimeoutMs: 0,
    });
  });

  it('requires a listing URL from somewhere', () => {
    const config = new ConfigFile(join(dir, 'missing.yaml'));
    expect(() => config.toRunOptions({}, {}, dir)).toThrow(/No listing URL/);
    expect(config.toRunOptions({ url: 'https://github.com/acme' }, {}, dir).sourceUrl).toBe('https://github.com/acme');
  });

  it('writes a starter config that loads cleanly', () => {
    const config = ConfigFile.init(dir);
    expect(readFileSync(config.path, 'utf-8')).toContain('url: https://opendev.org/api/v1/repos/search?limit=1000');
    expect(config.data.source.url).toBe('https://opendev.org/api/v1/repos/search?limit=1000');
    expect(() => ConfigFile.init(dir)).toThrow(/Config already exists/);
  });
});
