/**
 * Rule Matcher
 *
 * Compiles a route template into a regular expression for request dispatch.
 * Converters narrow what a placeholder accepts:
 *
 * - default / string: one path segment (`length`, `minLength`, `maxLength` honoured)
 * - int: digits, converted to a number, `min`/`max` checked after matching
 * - float: `1.5` style decimals, converted to a number
 * - uuid: canonical UUID text
 * - path: the rest of the path, slashes included
 * - any: one of the converter's positional arguments
 */

import { parseConverterArgs } from './converter-args.js'
import { parseRule } from './rule-parser.js'
import type { ConverterArgs } from './types.js'

/** Matched path parameters */
export type RouteParams = Record<string, string | number>

interface CompiledParam {
  name: string
  converter: string
  options: ConverterArgs
}

export interface CompiledRule {
  pattern: RegExp
  params: CompiledParam[]
}

const UUID_PATTERN = '[A-Fa-f0-9]{8}-[A-Fa-f0-9]{4}-[A-Fa-f0-9]{4}-[A-Fa-f0-9]{4}-[A-Fa-f0-9]{12}'

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function numberOption(options: ConverterArgs, key: string): number | undefined {
  const value = options.kwargs[key]
  return typeof value === 'number' ? value : undefined
}

function segmentPattern(converter: string, options: ConverterArgs): string {
  switch (converter) {
    case 'int':
      return '\\d+'
    case 'float':
      return '\\d+\\.\\d+'
    case 'uuid':
      return UUID_PATTERN
    case 'path':
      return '[^/].*?'
    case 'any':
      // No choices: never match
      if (options.args.length === 0) return '(?!)'
      return `(?:${options.args.map((arg) => escapeRegExp(String(arg))).join('|')})`
    case 'string': {
      const length = numberOption(options, 'length')
      if (length !== undefined) return `[^/]{${length}}`
      const min = numberOption(options, 'minLength') ?? 1
      const max = numberOption(options, 'maxLength')
      return `[^/]{${min},${max ?? ''}}`
    }
    default:
      return '[^/]+'
  }
}

/**
 * Compile a route template
 *
 * @throws RouteDocError for malformed templates or converter arguments
 */
export function compileRule(rule: string): CompiledRule {
  const params: CompiledParam[] = []
  let source = ''

  for (const segment of parseRule(rule)) {
    if (segment.kind === 'static') {
      source += escapeRegExp(segment.text)
      continue
    }

    const options: ConverterArgs = segment.args
      ? parseConverterArgs(segment.args)
      : { args: [], kwargs: {} }
    params.push({ name: segment.name, converter: segment.converter, options })
    source += `(${segmentPattern(segment.converter, options)})`
  }

  return { pattern: new RegExp(`^${source}$`), params }
}

function convertValue(param: CompiledParam, raw: string): string | number | undefined {
  if (param.converter === 'int') {
    const value = Number.parseInt(raw, 10)
    const min = numberOption(param.options, 'min')
    const max = numberOption(param.options, 'max')
    if (min !== undefined && value < min) return undefined
    if (max !== undefined && value > max) return undefined
    return value
  }
  if (param.converter === 'float') {
    return Number.parseFloat(raw)
  }
  return raw
}

/**
 * Match a request path against a compiled rule
 *
 * @returns the converted parameters, or null when the path does not match
 */
export function matchRule(compiled: CompiledRule, pathname: string): RouteParams | null {
  const match = compiled.pattern.exec(pathname)
  if (!match) return null

  const params: RouteParams = {}
  for (let i = 0; i < compiled.params.length; i++) {
    const param = compiled.params[i]
    const raw = match[i + 1]
    if (param === undefined || raw === undefined) return null

    let decoded: string
    try {
      decoded = decodeURIComponent(raw)
    } catch {
      return null
    }

    const value = convertValue(param, decoded)
    if (value === undefined) return null
    params[param.name] = value
  }

  return params
}
