import type { MockInstance } from 'vitest'

import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'
import { execFileSync } from 'node:child_process'

import { ResolutionError } from '../../core/errors/resolution-error'
import { createGitRunner } from '../../core/git/create-git-runner'

vi.mock(import('node:child_process'), () => ({
  execFileSync: vi.fn(),
}))

describe('createGitRunner', () => {
  let consoleErrorSpy: MockInstance

  beforeEach(() => {
    vi.clearAllMocks()
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleErrorSpy.mockRestore()
  })

  it('runs git and trims stdout', () => {
    vi.mocked(execFileSync).mockReturnValue('abc\n')

    let git = createGitRunner()

    expect(git(['rev-parse', 'HEAD'])).toBe('abc')
    expect(execFileSync).toHaveBeenCalledWith('git', ['rev-parse', 'HEAD'], {
      stdio: ['ignore', 'pipe', 'pipe'],
      encoding: 'utf8',
    })
  })

  it('passes the repository directory with -C', () => {
    vi.mocked(execFileSync).mockReturnValue('main\n')

    let git = createGitRunner({ cwd: '/repo' })
    git(['rev-parse', '--abbrev-ref', 'HEAD'])

    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['-C', '/repo', 'rev-parse', '--abbrev-ref', 'HEAD'],
      expect.any(Object),
    )
  })

  it('logs commands to stderr when verbose', () => {
    vi.mocked(execFileSync).mockReturnValue('')

    let git = createGitRunner({ cwd: '/repo', verbose: true })
    git(['tag', '--list'])

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining('$ git -C /repo tag --list'),
    )
  })

  it('stays quiet without verbose', () => {
    vi.mocked(execFileSync).mockReturnValue('')

    createGitRunner()(['tag', '--list'])

    expect(consoleErrorSpy).not.toHaveBeenCalled()
  })

  it('wraps failures with the first stderr line', () => {
    vi.mocked(execFileSync).mockImplementation(() => {
      throw Object.assign(new Error('Command failed'), {
        stderr: 'fatal: not a git repository\nhint: more\n',
      })
    })

    let git = createGitRunner()

    expect(() => git(['rev-parse', 'HEAD'])).toThrowError(ResolutionError)
    expect(() => git(['rev-parse', 'HEAD'])).toThrowError(
      'git rev-parse HEAD failed: fatal: not a git repository',
    )
  })

  it('falls back to the error message when stderr is empty', () => {
    vi.mocked(execFileSync).mockImplementation(() => {
      throw Object.assign(new Error('spawn git ENOENT'), { stderr: '' })
    })

    expect(() => createGitRunner()(['status'])).toThrowError(
      'git status failed: spawn git ENOENT',
    )
  })
})
