/**
 * Whether stderr output may carry ANSI colour.
 * Reads argv directly: errors from parsing the arguments are printed too.
 */
export const useColor = (env: NodeJS.ProcessEnv = process.env, argv: readonly string[] = process.argv): boolean => {
  if (env.NO_COLOR !== undefined) return false
  if (env.TERM === 'dumb') return false
  if (argv.includes('--no-color')) return false

  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== '0') return true

  if (process.stderr.isTTY) return true

  return env.CI === 'true' || env.CI === '1' || 'GITHUB_ACTIONS' in env
}
