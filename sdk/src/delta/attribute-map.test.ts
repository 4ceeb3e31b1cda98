import { describe, it, expect } from 'vitest'
import { AttributeMapUtils } from './attribute-map'

describe('AttributeMapUtils.compose()', () => {
  it('should let the second map win', () => {
    expect(AttributeMapUtils.compose({ color: '#000000', bold: true }, { color: '#ffffff' }, false)).toEqual({
      color: '#ffffff',
      bold: true
    })
  })

  it('should drop cleared attributes when composing onto content', () => {
    expect(AttributeMapUtils.compose({ bold: true, italic: true }, { bold: null }, false)).toEqual({ italic: true })
  })

  it('should keep clear markers when composing retains', () => {
    expect(AttributeMapUtils.compose({ bold: true }, { bold: null }, true)).toEqual({ bold: null })
  })

  it('should return undefined when nothing is left', () => {
    expect(AttributeMapUtils.compose({ bold: true }, { bold: null }, false)).toBeUndefined()
    expect(AttributeMapUtils.compose(undefined, undefined, true)).toBeUndefined()
  })
})

describe('AttributeMapUtils', () => {
  it('should compare maps by entries', () => {
    expect(AttributeMapUtils.equals({ bold: true, header: 1 }, { header: 1, bold: true })).toBe(true)
    expect(AttributeMapUtils.equals({}, undefined)).toBe(true)
    expect(AttributeMapUtils.equals({ list: null }, { list: null })).toBe(true)
    expect(AttributeMapUtils.equals({ list: null }, {})).toBe(false)
    expect(AttributeMapUtils.equals({ header: 1 }, { header: 2 })).toBe(false)
  })

  it('should intersect maps', () => {
    expect(AttributeMapUtils.intersect({ bold: true, color: '#ff0000' }, { bold: true, color: '#00ff00' })).toEqual({
      bold: true
    })
  })

  it('should strip null entries', () => {
    expect(AttributeMapUtils.withoutNulls({ bold: true, italic: null })).toEqual({ bold: true })
  })

  it('should describe maps', () => {
    expect(AttributeMapUtils.toString({ bold: true, header: 1, list: null })).toBe('[bold, header:1, list:null]')
    expect(AttributeMapUtils.toString(undefined)).toBe('[none]')
    expect(AttributeMapUtils.toString({})).toBe('[none]')
  })
})
