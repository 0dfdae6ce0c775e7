import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join, dirname, resolve, isAbsolute } from 'node:path';
import { homedir } from 'node:os';
import yaml from 'js-yaml';
import { MirrorConfigSchema } from './schema.js';
import type { MirrorConfig, RunOptions, SourceKind } from './schema.js';
import { CONFIG_FILENAME, ENV_CONFIG_OVERRIDE } from './branding.js';
import { ConfigurationError } from '../core/errors.js';

const STARTER_CONFIG = [
  '# Directory the <org>/<name> clones live under, relative to this file.',
  'root: .',
  'source:',
  '  # GitHub (https://github.com/<org>), Gitea (/api/v1/repos/search) or Gerrit (/projects/).',
  '  url: https://opendev.org/api/v1/repos/search?limit=1000',
  '  kind: auto',
  '  token_env: GITHUB_TOKEN',
  'ignore_orgs: []',
  '# 0 = one worker per core',
  'jobs: 0',
  'recurse_submodules: false',
  'create_org_dirs: false',
  '# Per git command, in milliseconds; 0 = no timeout',
  'git_timeout_ms: 0',
  '',
].join('\n');

/** Flags given on the command line; each one wins over the config file. */
export interface CliOverrides {
  url?: string;
  kind?: SourceKind;
  root?: string;
  jobs?: number;
  ignore?: string[];
  recurseSubmodules?: boolean;
  createOrgDirs?: boolean;
  deleteOnly?: boolean;
  yes?: boolean;
  gitTimeout?: number;
}

/**
 * Loads orgmirror.yaml (validated with Zod) and merges it with CLI flags.
 * A missing file means defaults; everything then has to come from flags.
 */
export class ConfigFile {
  private config: MirrorConfig;
  private filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath ? resolve(filePath) : ConfigFile.find();
    this.config = this.load();
  }

  // ─── Discovery ─────────────────────────────────────────────────────

  /** $ORGMIRROR_CONFIG, then the nearest orgmirror.yaml walking up from cwd. */
  static find(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): string {
    const override = env[ENV_CONFIG_OVERRIDE];
    if (override) return resolve(cwd, override);

    let dir = cwd;
    while (true) {
      const candidate = join(dir, CONFIG_FILENAME);
      if (existsSync(candidate)) return candidate;
      const parent = dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }
    return join(cwd, CONFIG_FILENAME);
  }

  // ─── Load ─────────────────────────────────────────────────────────

  private load(): MirrorConfig {
    if (!existsSync(this.filePath)) {
      return MirrorConfigSchema.parse({});
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Could not read ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = MirrorConfigSchema.safeParse(parsed ?? {});
    if (!result.success) {
      const issues = result.error.issues.map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ConfigurationError(`Invalid config in ${this.filePath}:\n${issues.join('\n')}`);
    }
    return result.data;
  }

  get data(): MirrorConfig {
    return this.config;
  }

  get path(): string {
    return this.filePath;
  }

  get exists(): boolean {
    return existsSync(this.filePath);
  }

  // ─── Init ─────────────────────────────────────────────────────────

  /** Write a starter config. Throws if one already exists. */
  static init(dir: string = process.cwd()): ConfigFile {
    const filePath = join(resolve(dir), CONFIG_FILENAME);
    if (existsSync(filePath)) {
      throw new ConfigurationError(`Config already exists at ${filePath}`);
    }
    writeFileSync(filePath, STARTER_CONFIG, 'utf-8');
    return new ConfigFile(filePath);
  }

  // ─── Resolution ───────────────────────────────────────────────────

  /** Mirror root: a flag is relative to cwd, the file's value to the file. */
  resolveRoot(flagRoot?: string, cwd: string = process.cwd()): string {
    if (flagRoot) return resolve(cwd, expandHome(flagRoot));
    const root = expandHome(this.config.root);
    if (isAbsolute(root)) return root;
    return resolve(this.exists ? dirname(this.filePath) : cwd, root);
  }

  /** Merge flags over file values into the options one run uses. */
  toRunOptions(flags: CliOverrides, env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): RunOptions {
    const { source } = this.config;
    const sourceUrl = flags.url ?? source.url;
    if (!sourceUrl) {
      throw new ConfigurationError(`No listing URL: pass one as an argument or set source.url in ${CONFIG_FILENAME}`);
    }

    const jobs = flags.jobs ?? this.config.jobs;
    const gitTimeoutMs = flags.gitTimeout ?? this.config.git_timeout_ms;
    if (!Number.isInteger(jobs) || jobs < 0) {
      throw new ConfigurationError(`--jobs must be a non-negative integer, got ${jobs}`);
    }
    if (!Number.isInteger(gitTimeoutMs) || gitTimeoutMs < 0) {
      throw new ConfigurationError(`--git-timeout must be a non-negative integer, got ${gitTimeoutMs}`);
    }

    return {
      root: this.resolveRoot(flags.root, cwd),
      sourceUrl,
      sourceKind: flags.kind ?? source.kind,
      cloneBase: source.clone_base,
      token: env[source.token_env] ?? env.GH_TOKEN,
      ignoredOrgs: new Set(flags.ignore ?? this.config.ignore_orgs),
      concurrency: jobs,
      recurseSubmodules: flags.recurseSubmodules ?? this.config.recurse_submodules,
      createOrgDirs: flags.createOrgDirs ?? this.config.create_org_dirs,
      deleteOnly: flags.deleteOnly ?? false,
      assumeYes: flags.yes ?? false,
      gitTimeoutMs,
    };
  }
}

function expandHome(path: string): string {
  return path.startsWith('~') ? path.replace('~', homedir()) : path;
}
