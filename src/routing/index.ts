/**
 * Routing Module
 *
 * Route template parsing, converter arguments, matching and the route table.
 */

export { parseRule, DEFAULT_CONVERTER } from './rule-parser.js'
export { parseConverterArgs } from './converter-args.js'
export { compileRule, matchRule, type CompiledRule, type RouteParams } from './matcher.js'
export {
  createRouteTable,
  normalizeMethods,
  type RouteTable,
  type RouteEntry,
  type RouteMatch,
  type AddRouteInput,
} from './route-table.js'
export {
  isHttpMethod,
  toLowerMethod,
  type HttpMethod,
  type RuleSegment,
  type ConverterArg,
  type ConverterArgs,
  type RouteRule,
  type RouteSource,
} from './types.js'
