import { z } from 'zod';

// ─── Listing Source ────────────────────────────────────────────────

export const SourceKindSchema = z.enum(['auto', 'standard', 'github']);

export type SourceKind = z.infer<typeof SourceKindSchema>;

export const SourceConfigSchema = z.object({
  url: z.string().url().optional(),
  kind: SourceKindSchema.default('auto'),
  /** Base URL standard listings are cloned from; derived from the listing URL when absent. */
  clone_base: z.string().url().optional(),
  token_env: z.string().default('GITHUB_TOKEN'),
});

export type SourceConfig = z.infer<typeof SourceConfigSchema>;

// ─── Root Config ───────────────────────────────────────────────────

export const MirrorConfigSchema = z.object({
  root: z.string().default('.'),
  source: SourceConfigSchema.default(() => SourceConfigSchema.parse({})),
  ignore_orgs: z.array(z.string().min(1)).default([]),
  /** Worker count; 0 means one per available core. */
  jobs: z.number().int().nonnegative().default(0),
  recurse_submodules: z.boolean().default(false),
  create_org_dirs: z.boolean().default(false),
  /** Per git command; 0 disables the timeout. */
  git_timeout_ms: z.number().int().nonnegative().default(0),
});

export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;

// ─── Resolved Run Options ──────────────────────────────────────────

/** Config file values merged with CLI flags, paths made absolute. */
export interface RunOptions {
  root: string;
  sourceUrl: string;
  sourceKind: SourceKind;
  cloneBase?: string;
  token?: string;
  ignoredOrgs: ReadonlySet<string>;
  concurrency: number;
  recurseSubmodules: boolean;
  createOrgDirs: boolean;
  deleteOnly: boolean;
  assumeYes: boolean;
  gitTimeoutMs: number;
}
