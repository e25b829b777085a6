import pc from 'picocolors'

/**
 * Prints a one-line diagnostic to stderr.
 *
 * @param error - Thrown value.
 */
export function printError(error: unknown): void {
  console.error(
    pc.redBright('Error:'),
    error instanceof Error ? error.message : String(error),
  )
}
