import { describe, it, expect } from 'vitest'
import { Attribute } from '../attributes/attribute'
import { Attributes, defaultCatalog } from '../attributes/catalog'
import { Delta } from '../delta/delta'
import { resolveInlineFormat } from './inline-format'

function inlineFormat(document: Delta, index: number, length: number, attribute: Attribute) {
  return resolveInlineFormat.apply({ document, index, length, attribute, catalog: defaultCatalog })
}

const bold = { bold: true }

describe('resolveInlineFormat', () => {
  it('should leave the line terminator unstyled', () => {
    expect(inlineFormat(new Delta().insert('Hello\n'), 0, 6, Attributes.bold)?.toJSON()).toEqual([
      { retain: 5, attributes: bold },
      { retain: 1 }
    ])
  })

  it('should split a range at every newline', () => {
    expect(inlineFormat(new Delta().insert('Hello\nWorld\n'), 3, 6, Attributes.bold)?.toJSON()).toEqual([
      { retain: 3 },
      { retain: 2, attributes: bold },
      { retain: 1 },
      { retain: 3, attributes: bold }
    ])
  })

  it('should skip empty lines', () => {
    expect(inlineFormat(new Delta().insert('a\n\nb\n'), 0, 4, Attributes.bold)?.toJSON()).toEqual([
      { retain: 1, attributes: bold },
      { retain: 2 },
      { retain: 1, attributes: bold }
    ])
  })

  it('should merge across operation boundaries', () => {
    const document = new Delta().insert('ab', { italic: true }).insert('cd\n')

    expect(inlineFormat(document, 0, 4, Attributes.bold)?.toJSON()).toEqual([{ retain: 4, attributes: bold }])
  })

  it('should style embeds', () => {
    const document = new Delta().insert('a').insert({ image: 'a.png' }).insert('\n')

    expect(inlineFormat(document, 0, 2, Attributes.link('https://example.com'))?.toJSON()).toEqual([
      { retain: 2, attributes: { link: 'https://example.com' } }
    ])
  })

  it('should carry a removal', () => {
    const document = new Delta().insert('Hello', { bold: true }).insert('\n')

    expect(inlineFormat(document, 1, 3, Attribute.clone(Attributes.bold, null))?.toJSON()).toEqual([
      { retain: 1 },
      { retain: 3, attributes: { bold: null } }
    ])
  })

  it('should produce an empty patch for a collapsed range', () => {
    expect(inlineFormat(new Delta().insert('Hello\n'), 2, 0, Attributes.bold)?.toJSON()).toEqual([{ retain: 2 }])
  })

  it('should decline block attributes', () => {
    expect(inlineFormat(new Delta().insert('Hello\n'), 0, 5, Attributes.header(1))).toBeNull()
  })
})
