/**
 * Documentation UI
 *
 * Exports the viewer page builders.
 */

export { generateDocsHTML, generateSwaggerHTML, generateRedocHTML } from './pages.js'
export { escapeHtml, escapeJsonForScript } from './utils.js'
export type * from './types.js'
