/**
 * Converter Argument Tokenizer
 *
 * Reads the text between the parentheses of `<converter(args):name>` into
 * positional and keyword arguments.
 *
 * @example
 * parseConverterArgs('min=1, max=10')   // { args: [], kwargs: { min: 1, max: 10 } }
 * parseConverterArgs("about, 'help'")   // { args: ['about', 'help'], kwargs: {} }
 */

import type { ConverterArg, ConverterArgs } from './types.js'

// Word characters in the Unicode sense: letters, digits and underscore
const WORD = '[\\p{L}\\p{N}_]'

const ARGUMENT_PATTERN = new RegExp(
  [
    '\\s*',
    `(?:(?<name>${WORD}+)\\s*=\\s*)?`,
    '(?<value>',
    'True|False|',
    '\\d+.\\d+|',
    '\\d+.|',
    '\\d+|',
    `(?:${WORD}|\\.)+|`,
    '[urUR]?(?<stringval>"[^"]*?"|\'[^\']*\')',
    ')\\s*,',
  ].join(''),
  'gu'
)

const CONSTANTS: Record<string, ConverterArg> = {
  None: null,
  True: true,
  False: false,
}

const INTEGER = /^\d+$/
const FLOAT = /^(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/

/**
 * Convert a raw token to a boolean, null, number or unquoted string
 */
function toValue(raw: string): ConverterArg {
  if (Object.prototype.hasOwnProperty.call(CONSTANTS, raw)) {
    return CONSTANTS[raw] ?? null
  }
  if (INTEGER.test(raw)) {
    return Number.parseInt(raw, 10)
  }
  if (FLOAT.test(raw)) {
    return Number.parseFloat(raw)
  }
  const quote = raw[0]
  if (raw.length >= 2 && (quote === '"' || quote === "'") && raw.endsWith(quote)) {
    return raw.slice(1, -1)
  }
  return raw
}

/**
 * Tokenize a converter argument string.
 *
 * Items are read left to right; text that does not form an item (a stray `=`,
 * a sign in front of a number) is skipped, so `min=-5` reads as the positional
 * argument `5`.
 */
export function parseConverterArgs(argstr: string): ConverterArgs {
  const args: ConverterArg[] = []
  const kwargs: Record<string, ConverterArg> = {}

  for (const match of `${argstr},`.matchAll(ARGUMENT_PATTERN)) {
    const groups = match.groups ?? {}
    const token = toValue(groups.stringval ?? groups.value ?? '')

    if (groups.name) {
      kwargs[groups.name] = token
    } else {
      args.push(token)
    }
  }

  return { args, kwargs }
}
