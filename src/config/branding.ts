// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (CLI command, config filename). */
export const APP_NAME = 'orgmirror';

export const APP_VERSION = '0.1.0';

// ─── Derived Values ─────────────────────────────────────────────────

/** Config filename: orgmirror.yaml */
export const CONFIG_FILENAME = `${APP_NAME}.yaml`;

/** Environment variable pointing at a config file, checked before the upward search. */
export const ENV_CONFIG_OVERRIDE = `${APP_NAME.toUpperCase()}_CONFIG`;

/** Branches a mirrored clone is expected to sit on. */
export const MAIN_BRANCHES: readonly string[] = ['master', 'main'];
