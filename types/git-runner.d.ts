/**
 * Runs `git` with the given arguments and returns its trimmed stdout.
 *
 * Implementations throw a `ResolutionError` when git exits with a non-zero
 * status.
 */
export type GitRunner = (args: string[]) => string
