/**
 * Converter Schema Table Tests
 */

import { describe, it, expect } from 'vitest'
import { getConverterSchema } from './converters.js'

describe('getConverterSchema', () => {
  it('should describe int with optional bounds', () => {
    expect(getConverterSchema('int')).toEqual({ type: 'integer', format: 'int32' })
    expect(getConverterSchema('int', [], { min: 1, max: 10 })).toEqual({
      type: 'integer',
      format: 'int32',
      minimum: 1,
      maximum: 10,
    })
  })

  it('should ignore int arguments other than min and max', () => {
    expect(getConverterSchema('int', [4], { fixed_digits: 4 })).toEqual({
      type: 'integer',
      format: 'int32',
    })
  })

  it('should list the choices of any as a string enum', () => {
    expect(getConverterSchema('any', ['about', 'help'])).toEqual({
      type: 'array',
      items: { type: 'string', enum: ['about', 'help'] },
    })
  })

  it('should describe float, uuid and path', () => {
    expect(getConverterSchema('float')).toEqual({ type: 'number', format: 'float' })
    expect(getConverterSchema('uuid')).toEqual({ type: 'string', format: 'uuid' })
    expect(getConverterSchema('path')).toEqual({ type: 'string', format: 'path' })
  })

  it('should copy string length arguments verbatim', () => {
    expect(getConverterSchema('string', [], { length: 2, minLength: 1, maxLength: 8 })).toEqual({
      type: 'string',
      length: 2,
      maxLength: 8,
      minLength: 1,
    })
  })

  it('should fall back to a plain string for unknown converters', () => {
    expect(getConverterSchema('default')).toEqual({ type: 'string' })
    expect(getConverterSchema('slug', ['x'], { y: 1 })).toEqual({ type: 'string' })
  })
})
