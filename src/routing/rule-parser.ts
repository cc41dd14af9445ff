/**
 * Route Template Parser
 *
 * Splits a route template such as `/items/<int(min=1):id>/<name>` into static and
 * dynamic segments. Placeholders take one of three forms:
 *
 * - `<name>`
 * - `<converter:name>`
 * - `<converter(args):name>`
 *
 * Identifiers are `[A-Za-z_][A-Za-z0-9_]*`. Converter arguments are the shortest
 * run of characters (no line breaks) followed by `):name>`.
 */

import { Errors } from '../errors/index.js'
import type { RuleSegment } from './types.js'

export const DEFAULT_CONVERTER = 'default'

/** One placeholder match starting at a given position */
interface PlaceholderMatch {
  static: string
  converter: string | undefined
  args: string | undefined
  name: string
  end: number
}

function isIdentStart(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z_]$/.test(ch)
}

function isIdentPart(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9_]$/.test(ch)
}

/**
 * Scanner over a single template. `matchAt` never advances on its own; the
 * caller moves the cursor to `end` after each successful match.
 */
class RuleScanner {
  constructor(private readonly rule: string) {}

  get length(): number {
    return this.rule.length
  }

  remainder(pos: number): string {
    return this.rule.slice(pos)
  }

  /**
   * Read an identifier at `pos`, returning the index just past it
   */
  private readIdent(pos: number): number | undefined {
    if (!isIdentStart(this.rule[pos])) return undefined
    let end = pos + 1
    while (isIdentPart(this.rule[end])) end++
    return end
  }

  /**
   * Read `name>` at `pos`, returning the name and the index past `>`
   */
  private readVariable(pos: number): { name: string; end: number } | undefined {
    const end = this.readIdent(pos)
    if (end === undefined || this.rule[end] !== '>') return undefined
    return { name: this.rule.slice(pos, end), end: end + 1 }
  }

  /**
   * Match static text plus one placeholder starting at `pos`
   */
  matchAt(pos: number): PlaceholderMatch | undefined {
    const open = this.rule.indexOf('<', pos)
    if (open === -1) return undefined

    const text = this.rule.slice(pos, open)
    const start = open + 1

    const converterEnd = this.readIdent(start)
    if (converterEnd !== undefined) {
      const converter = this.rule.slice(start, converterEnd)

      if (this.rule[converterEnd] === '(') {
        // Shortest argument text that is followed by `):name>`
        for (let i = converterEnd + 1; i < this.rule.length; i++) {
          const ch = this.rule[i]
          if (ch === '\n') break
          if (ch !== ')' || this.rule[i + 1] !== ':') continue
          const variable = this.readVariable(i + 2)
          if (variable) {
            return {
              static: text,
              converter,
              args: this.rule.slice(converterEnd + 1, i),
              name: variable.name,
              end: variable.end,
            }
          }
        }
      } else if (this.rule[converterEnd] === ':') {
        const variable = this.readVariable(converterEnd + 1)
        if (variable) {
          return { static: text, converter, args: undefined, name: variable.name, end: variable.end }
        }
      }
    }

    const variable = this.readVariable(start)
    if (variable) {
      return { static: text, converter: undefined, args: undefined, name: variable.name, end: variable.end }
    }

    return undefined
  }
}

/**
 * Parse a route template into segments.
 *
 * The generator is lazy and single-pass. Static text before a placeholder is
 * yielded before the placeholder itself, so a duplicate name is only reported
 * once iteration reaches it.
 *
 * @throws RouteDocError `DUPLICATE_PARAMETER_NAME` when a name repeats
 * @throws RouteDocError `MALFORMED_TEMPLATE` when unmatched text contains `<` or `>`
 *
 * @example
 * [...parseRule('/items/<int:id>')]
 * // [{ kind: 'static', text: '/items/' },
 * //  { kind: 'dynamic', converter: 'int', args: undefined, name: 'id' }]
 */
export function* parseRule(rule: string): Generator<RuleSegment, void, undefined> {
  const scanner = new RuleScanner(rule)
  const usedNames = new Set<string>()
  let pos = 0

  while (pos < scanner.length) {
    const match = scanner.matchAt(pos)
    if (!match) break

    if (match.static) {
      yield { kind: 'static', text: match.static }
    }

    if (usedNames.has(match.name)) {
      throw Errors.duplicateParameter(match.name, rule)
    }
    usedNames.add(match.name)

    yield {
      kind: 'dynamic',
      converter: match.converter || DEFAULT_CONVERTER,
      args: match.args || undefined,
      name: match.name,
    }
    pos = match.end
  }

  if (pos < scanner.length) {
    const remaining = scanner.remainder(pos)
    if (remaining.includes('>') || remaining.includes('<')) {
      throw Errors.malformedTemplate(rule)
    }
    yield { kind: 'static', text: remaining }
  }
}
