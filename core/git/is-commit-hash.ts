/**
 * Check whether the value is a full SHA-1 or SHA-256 commit hash.
 *
 * @param value - Raw git output.
 * @returns True for 40 or 64 lowercase hex characters.
 */
export function isCommitHash(value: string): boolean {
  return /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/u.test(value)
}
