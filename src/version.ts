export const VERSION = '0.1.0';

/**
 * Build metadata; release builds set these through the environment.
 */
export function buildInfo(env: NodeJS.ProcessEnv = process.env): { version: string; commit: string; date: string } {
  return {
    version: VERSION,
    commit: env.GIT_UTIL_BUILD_COMMIT || 'none',
    date: env.GIT_UTIL_BUILD_DATE || 'unknown'
  };
}
