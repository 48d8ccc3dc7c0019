import commandLineArgs from 'command-line-args'
import type {CommandLineOptions, OptionDefinition} from 'command-line-args'
import commandLineUsage from 'command-line-usage'
import chalk from 'chalk'
import {readFile} from 'fs'
import {formatJson, isFormatJsonError} from './FormatJson'
import type {FormatJsonError} from './FormatJson'
import {TokenizeError, locationToString} from './Tokenizer'

export const optionDefs: OptionDefinition[] = [
  {name: 'color', alias: 'c', type: Boolean},
  {name: 'help', alias: 'h', type: Boolean},
  {name: 'src', type: String, defaultOption: true}
]

/** Where the CLI writes results (`log`) and diagnostics (`error`) */
export interface Output {
  log(message: string): void
  error(message: string): void
}

export function usage(): string {
  return commandLineUsage([{
    header: 'json-fmt',
    content: `
      Reformats a JSON document with two-space indentation and one element or
      entry per line, and prints the result to stdout.
    `.trim().replace(/\s+/gm, ' ')
  }, {
    header: 'Examples',
    content: `
{bold json-fmt data.json}

Prints data.json, reformatted

{bold json-fmt --color data.json}

Same, with syntax highlighting
    `.trim()
  }, {
    header: 'Options',
    optionList: [{
      name: 'help',
      alias: 'h',
      description: 'Display this usage guide'
    }, {
      name: 'color',
      alias: 'c',
      description: 'Highlight the output with terminal colors'
    }, {
      name: 'src',
      typeLabel: '{underline file}',
      description: 'JSON file to format'
    }]
  }])
}

function readText(filename: string): Promise<string> {
  return new Promise((resolve, reject) =>
    readFile(filename, 'utf8', (err, data) => err ? reject(err) : resolve(data)))
}

export function readErrorMessage(filename: string, err: unknown): string {
  const code = err instanceof Error && 'code' in err ? err.code : undefined
  if (code === 'ENOENT') return `No such file or directory: '${filename}'`
  else if (code === 'EACCES') return `Permission denied: '${filename}'`
  else return `Error reading file '${filename}': ${
    err instanceof Error ? err.message : String(err)}`
}

export function diagnostic(filename: string, err: FormatJsonError): string {
  const where = err instanceof TokenizeError
    ? ` (${locationToString(err.location)})`
    : ''
  return `${filename}: ${err.message}${where}`
}

/**
 * Runs the command line `argv` (without the node and script paths) and
 * resolves to the process exit code.
 */
export async function run(argv: string[], out: Output = console): Promise<number> {
  const fail = (message: string) => {
    out.error(chalk.redBright(message))
    return 1
  }

  let options: CommandLineOptions
  try {
    options = commandLineArgs(optionDefs, {argv})
  } catch (ex) {
    if (!(ex instanceof Error)) throw ex
    out.log(usage())
    return fail(ex.message)
  }
  if (options.help) {
    out.log(usage())
    return 0
  }

  const filename: unknown = options.src
  if (typeof filename !== 'string') return fail('No filename provided')

  let content: string
  try {
    content = await readText(filename)
  } catch (ex) {
    return fail(readErrorMessage(filename, ex))
  }

  let formatted: string
  try {
    formatted = formatJson(content, {color: options.color === true})
  } catch (ex) {
    if (isFormatJsonError(ex)) return fail(diagnostic(filename, ex))
    throw ex
  }
  out.log(formatted)
  return 0
}
