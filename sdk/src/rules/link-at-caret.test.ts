import { describe, it, expect } from 'vitest'
import { Attribute } from '../attributes/attribute'
import { Attributes, defaultCatalog } from '../attributes/catalog'
import { Delta } from '../delta/delta'
import { formatLinkAtCaret } from './link-at-caret'

function linkAtCaret(document: Delta, index: number, length: number, attribute: Attribute) {
  return formatLinkAtCaret.apply({ document, index, length, attribute, catalog: defaultCatalog })
}

const updated = Attributes.link('https://example.com/new')

describe('formatLinkAtCaret', () => {
  const document = new Delta()
    .insert('Visit ')
    .insert('Go', { link: 'https://example.com/old' })
    .insert(' more text\n')

  it('should restyle the link ending at the caret', () => {
    expect(linkAtCaret(document, 8, 0, updated)?.toJSON()).toEqual([
      { retain: 6 },
      { retain: 2, attributes: { link: 'https://example.com/new' } }
    ])
  })

  it('should restyle the link starting at the caret', () => {
    expect(linkAtCaret(document, 6, 0, updated)?.toJSON()).toEqual([
      { retain: 6 },
      { retain: 2, attributes: { link: 'https://example.com/new' } }
    ])
  })

  it('should restyle a link the caret sits inside', () => {
    expect(linkAtCaret(document, 7, 0, updated)?.toJSON()).toEqual([
      { retain: 6 },
      { retain: 2, attributes: { link: 'https://example.com/new' } }
    ])
  })

  it('should remove a link', () => {
    expect(linkAtCaret(document, 7, 0, Attributes.link(null))?.toJSON()).toEqual([
      { retain: 6 },
      { retain: 2, attributes: { link: null } }
    ])
  })

  it('should cover links on both sides of the caret', () => {
    const adjacent = new Delta()
      .insert('ab', { link: 'https://example.com/x' })
      .insert('cd', { link: 'https://example.com/y' })
      .insert('\n')

    expect(linkAtCaret(adjacent, 2, 0, Attributes.link('https://example.com/z'))?.toJSON()).toEqual([
      { retain: 4, attributes: { link: 'https://example.com/z' } }
    ])
  })

  it('should decline when no link touches the caret', () => {
    expect(linkAtCaret(document, 2, 0, updated)).toBeNull()
    expect(linkAtCaret(document, 0, 0, updated)).toBeNull()
  })

  it('should decline selections', () => {
    expect(linkAtCaret(document, 6, 2, updated)).toBeNull()
  })

  it('should decline other attributes', () => {
    expect(linkAtCaret(document, 7, 0, Attributes.bold)).toBeNull()
  })
})
