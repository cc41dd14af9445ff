/**
 * Text helpers for documentation strings
 */

/**
 * Upper-case the first character and lower-case the rest
 *
 * @example
 * capitalize('listItems') // 'Listitems'
 */
export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length
}

/**
 * Normalize a documentation string: tabs become spaces, the first line loses its
 * leading whitespace, the common indentation of the remaining lines is removed,
 * and leading/trailing blank lines are dropped.
 */
export function cleanDoc(doc: string): string {
  const lines = doc.replace(/\t/g, '        ').split(/\r?\n/)

  const rest = lines.slice(1).filter((line) => line.trim() !== '')
  const margin = rest.length > 0 ? Math.min(...rest.map(indentOf)) : 0

  const cleaned = [
    (lines[0] ?? '').trimStart(),
    ...lines.slice(1).map((line) => line.slice(margin).trimEnd()),
  ]

  while (cleaned.length > 0 && cleaned[0]?.trim() === '') cleaned.shift()
  while (cleaned.length > 0 && cleaned[cleaned.length - 1]?.trim() === '') cleaned.pop()

  return cleaned.join('\n')
}
