import { createSpinner } from 'nanospinner'
import pc from 'picocolors'
import cac from 'cac'

import {
  DEFAULT_ENV_PREFIX,
  formatVersionInfo,
} from '../core/format/format-version-info'
import { normalizeIncrementKind } from './normalize-increment-kind'
import { normalizeOutputFormat } from './normalize-output-format'
import { createGitRunner } from '../core/git/create-git-runner'
import { resolveVersion } from '../core/resolve-version'
import { readStringOption } from './read-string-option'
import { parseShowFields } from './parse-show-fields'
import { parseStripCount } from './parse-strip-count'
import { readRawOption } from './read-raw-option'
import { printError } from './print-error'
import { version } from '../package.json'

/** CLI Options. */
interface CLIOptions {
  /** Leading branch path components to drop. */
  stripBranchComponents?: string | number

  /** Literal prefix tags must start with. */
  tagPrefix?: string | number

  /** Prefix for env keys. */
  envPrefix?: string | number

  /** Output format (json, env, csv). */
  format?: string | number

  /** Comma-separated fields to print. */
  show?: string | number

  /** Repository directory. */
  cwd?: string | number

  /** Indent JSON output. */
  jsonPretty?: boolean

  /** Print a CSV header row. */
  csvHeader?: boolean

  /** Log git commands to stderr. */
  verbose?: boolean
}

/**
 * Run the CLI.
 *
 * @param argv - Process arguments, including the node and script paths.
 */
export function run(argv: string[] = process.argv): void {
  let cli = cac('git-semver-info')

  cli
    .help()
    .version(version)
    .option(
      '--tag-prefix <prefix>',
      'Prefix tags must start with (default: "")',
    )
    .option(
      '--format <format>',
      'Output format: json, env or csv (default: json)',
    )
    .option('--json-pretty', 'Indent JSON output')
    .option(
      '--env-prefix <prefix>',
      `Prefix for env keys (default: ${DEFAULT_ENV_PREFIX})`,
    )
    .option('--csv-header', 'Print a header row before CSV values')
    .option('--show <fields>', 'Comma-separated fields to print (default: all)')
    .option(
      '--strip-branch-components <count>',
      'Drop leading branch path components (default: 0)',
    )
    .option('--cwd <directory>', 'Repository to inspect (default: cwd)')
    .option('--verbose', 'Log git commands to stderr')
    .command('<increment>', 'Compute the next major, minor or patch version')
    .action((increment: string | number, options: CLIOptions) => {
      let spinner = process.stderr.isTTY
        ? createSpinner('Resolving version...').start()
        : null

      try {
        /** Reject bad arguments before touching git. */
        let kind = normalizeIncrementKind(increment)
        let format = normalizeOutputFormat(options.format)
        let fields = parseShowFields(readStringOption(options.show, ''))
        let stripCount = parseStripCount(options.stripBranchComponents)
        let cwd =
          readRawOption(cli.rawArgs, 'cwd') ?? readStringOption(options.cwd, '')

        let git = createGitRunner({
          verbose: options.verbose ?? false,
          cwd: cwd || undefined,
        })

        let info = resolveVersion(
          {
            tagPrefix:
              readRawOption(cli.rawArgs, 'tag-prefix') ??
              readStringOption(options.tagPrefix, ''),
            stripBranchComponents: stripCount,
            increment: kind,
          },
          git,
        )

        let output = formatVersionInfo(info, {
          envPrefix:
            readRawOption(cli.rawArgs, 'env-prefix') ??
            readStringOption(options.envPrefix, DEFAULT_ENV_PREFIX),
          jsonPretty: options.jsonPretty ?? false,
          csvHeader: options.csvHeader ?? false,
          format,
          fields,
        })

        spinner?.success(`Next version ${pc.yellow(info.tag)}`)
        process.stdout.write(output)
      } catch (error) {
        spinner?.error('Failed')
        printError(error)
        process.exit(1)
      }
    })

  try {
    cli.parse(argv)
  } catch (error) {
    /** Argument errors raised by cac (missing increment, unknown option). */
    printError(error)
    process.exit(1)
  }
}
