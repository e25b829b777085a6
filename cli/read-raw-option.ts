/**
 * Read an option's text exactly as typed. cac coerces numeric-looking values
 * (`007`, `2024.`, `0x1`) to numbers, which loses the original string.
 *
 * Both `--name=value` and `--name value` are accepted; the last occurrence
 * wins and nothing after `--` is read.
 *
 * @param rawArgs - Unparsed process arguments.
 * @param name - Option name without dashes, e.g. `tag-prefix`.
 * @returns Option text, or undefined when it is not given a value.
 */
export function readRawOption(
  rawArgs: string[],
  name: string,
): string | undefined {
  let flag = `--${name}`
  let value: string | undefined

  for (let index = 0; index < rawArgs.length; index++) {
    let arg = rawArgs[index]
    if (arg === undefined || arg === '--') {
      break
    }
    if (arg.startsWith(`${flag}=`)) {
      value = arg.slice(flag.length + 1)
    } else if (arg === flag) {
      let next = rawArgs[index + 1]
      if (next !== undefined && !next.startsWith('-')) {
        value = next
        index++
      }
    }
  }

  return value
}
