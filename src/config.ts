import { z } from 'zod';
import { SecurityValidator } from './utils/security.js';

export const DEFAULT_GIT_BINARY = 'git';

const envSchema = z.object({
  GIT_UTIL_GIT_BINARY: z
    .string()
    .optional()
    .transform(value => value?.trim() || DEFAULT_GIT_BINARY)
});

export const cleanOptionsSchema = z.object({
  main: z.string().trim().min(1, 'Branch cannot be empty').optional(),
  delete: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  interactive: z.boolean().default(false)
});

export const scanOptionsSchema = z.object({
  directory: z.string().optional()
});

export const syncOptionsSchema = scanOptionsSchema.extend({
  action: z.string().default('fetch')
});

/**
 * Settings shared by every command, resolved once per invocation.
 */
export type Config = {
  /** git executable; `GIT_UTIL_GIT_BINARY` overrides the one on the search path */
  gitBinary: string;
  /** Directory the tool was started in */
  cwd: string;
};

export type CleanConfig = Config & {
  mainBranch?: string;
  delete: boolean;
  dryRun: boolean;
  interactive: boolean;
};

export type ScanConfig = Config & {
  /** Absolute, existing directory to scan for repositories */
  directory: string;
};

export type SyncConfig = ScanConfig & {
  /** Action as typed by the user; validated by `parseSyncAction` */
  action: string;
};

/**
 * Parses raw command options, reporting the first problem as a plain error
 * message instead of a list of schema issues.
 */
function parseOptions<T extends z.ZodTypeAny>(schema: T, options: unknown): z.output<T> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new Error(field ? `invalid option '${field}': ${issue.message}` : issue.message);
  }
  return result.data;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Config {
  const parsed = envSchema.parse(env);
  return { gitBinary: parsed.GIT_UTIL_GIT_BINARY, cwd };
}

/**
 * @throws {Error} When `--main` is blank or starts with `-`
 */
export function resolveCleanConfig(options: unknown, base: Config): CleanConfig {
  const parsed = parseOptions(cleanOptionsSchema, options);
  if (parsed.main !== undefined) {
    SecurityValidator.validateBranchName(parsed.main);
  }
  return {
    ...base,
    mainBranch: parsed.main,
    delete: parsed.delete,
    dryRun: parsed.dryRun,
    interactive: parsed.interactive
  };
}

/**
 * Resolves `--directory` (default: the current directory) to an absolute,
 * existing directory.
 */
export async function resolveScanConfig(options: unknown, base: Config): Promise<ScanConfig> {
  const parsed = parseOptions(scanOptionsSchema, options);
  const directory = await SecurityValidator.validateDirectory(parsed.directory ?? base.cwd);
  return { ...base, directory };
}

export async function resolveSyncConfig(options: unknown, base: Config): Promise<SyncConfig> {
  const parsed = parseOptions(syncOptionsSchema, options);
  const directory = await SecurityValidator.validateDirectory(parsed.directory ?? base.cwd);
  return { ...base, directory, action: parsed.action };
}
