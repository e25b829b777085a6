import { execFileSync } from 'node:child_process'
import pc from 'picocolors'

import type { GitRunner } from '../../types/git-runner'

import { ResolutionError } from '../errors/resolution-error'

/** Options for the git runner. */
interface GitRunnerOptions {
  /** Print every command to stderr before running it. */
  verbose?: boolean

  /** Repository directory, passed to git as `-C <cwd>`. */
  cwd?: string
}

/**
 * Create a runner that executes git synchronously.
 *
 * @param options - Runner options.
 * @returns Git runner bound to the given repository.
 */
export function createGitRunner(options: GitRunnerOptions = {}): GitRunner {
  let baseArgs = options.cwd ? ['-C', options.cwd] : []

  return args => {
    let fullArgs = [...baseArgs, ...args]
    if (options.verbose) {
      console.error(pc.gray(`$ git ${fullArgs.join(' ')}`))
    }

    try {
      let output = execFileSync('git', fullArgs, {
        stdio: ['ignore', 'pipe', 'pipe'],
        encoding: 'utf8',
      })
      return output.trim()
    } catch (error) {
      throw new ResolutionError(
        `git ${args.join(' ')} failed: ${describeFailure(error)}`,
      )
    }
  }
}

/**
 * Extract the most useful line from a failed child process.
 *
 * @param error - Error thrown by `execFileSync`.
 * @returns First stderr line, or the error message when stderr is empty.
 */
function describeFailure(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    let { stderr } = error
    if (typeof stderr === 'string') {
      let [firstLine] = stderr.trim().split(/\r?\n/u)
      if (firstLine) {
        return firstLine
      }
    }
  }
  return error instanceof Error ? error.message : String(error)
}
