import { describe, it, expect, vi } from 'vitest'
import { Attribute, AttributeScope } from '../attributes/attribute'
import { Attributes } from '../attributes/catalog'
import { Delta } from '../delta/delta'
import type { Logger } from '../logger'
import { ContractViolationError } from '../types'
import { DEFAULT_FORMAT_RULES, FormatRuleEngine } from './engine'
import type { FormatRule } from './format-rule'

function createMockLogger(): Logger {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

const document = new Delta().insert('Hello\nWorld\n')

describe('FormatRuleEngine - Dispatch', () => {
  it('should keep the rules in order', () => {
    expect(DEFAULT_FORMAT_RULES.map(rule => rule.name)).toEqual([
      'resolve-line-format',
      'format-link-at-caret',
      'resolve-inline-format',
      'resolve-embed-style'
    ])
  })

  it('should route block attributes to the line rule', () => {
    const engine = new FormatRuleEngine()

    expect(engine.format(document, 0, 0, Attributes.header(1)).toJSON()).toEqual([
      { retain: 5 },
      { retain: 1, attributes: { header: 1 } }
    ])
  })

  it('should route inline attributes to the inline rule', () => {
    const engine = new FormatRuleEngine()

    expect(engine.format(document, 0, 6, Attributes.italic).toJSON()).toEqual([
      { retain: 5, attributes: { italic: true } },
      { retain: 1 }
    ])
  })

  it('should let the inline rule handle a caret link with no neighbouring link', () => {
    const engine = new FormatRuleEngine()

    expect(engine.format(new Delta().insert('Hello\n'), 2, 0, Attributes.link('https://example.com')).toJSON()).toEqual([
      { retain: 2 }
    ])
  })

  it('should route embed styles to the embed rule', () => {
    const engine = new FormatRuleEngine()
    const withImage = new Delta().insert('a').insert({ image: 'a.png' }).insert('\n')

    expect(engine.format(withImage, 1, 1, Attributes.style('width: 100')).toJSON()).toEqual([
      { retain: 1 },
      { retain: 1, attributes: { style: 'width: 100' } }
    ])
  })

  it('should fall back to retaining the range', () => {
    const logger = createMockLogger()
    const engine = new FormatRuleEngine({ logger })
    const withImage = new Delta().insert('a').insert({ image: 'a.png' }).insert('\n')

    expect(engine.format(withImage, 1, 1, Attributes.width(100)).toJSON()).toEqual([
      { retain: 1 },
      { retain: 1, attributes: { width: 100 } }
    ])
    expect(logger.debug).toHaveBeenCalledWith('no rule applied width, retaining [1, 2)')
  })

  it('should stop at the first rule returning a patch', () => {
    const first: FormatRule = { name: 'first', apply: vi.fn(() => new Delta().retain(1, { bold: true })) }
    const second: FormatRule = { name: 'second', apply: vi.fn(() => null) }
    const logger = createMockLogger()
    const engine = new FormatRuleEngine({ rules: [first, second], logger })

    engine.format(document, 0, 1, Attributes.bold)

    expect(first.apply).toHaveBeenCalledTimes(1)
    expect(second.apply).not.toHaveBeenCalled()
    expect(logger.debug).toHaveBeenCalledWith('first applied bold at [0, 1)')
  })

  it('should hand the rules the request', () => {
    const apply = vi.fn(() => null)
    const engine = new FormatRuleEngine({ rules: [{ name: 'spy', apply }], logger: createMockLogger() })

    engine.format(document, 2, 3, Attributes.bold)

    expect(apply).toHaveBeenCalledWith(
      expect.objectContaining({ document, index: 2, length: 3, attribute: Attributes.bold })
    )
  })

  it('should not modify the document', () => {
    const engine = new FormatRuleEngine()
    engine.format(document, 0, 12, Attributes.header(1))

    expect(document.toJSON()).toEqual([{ insert: 'Hello\nWorld\n' }])
  })
})

describe('FormatRuleEngine - Preconditions', () => {
  const engine = new FormatRuleEngine({ logger: createMockLogger() })

  it('should reject ranges past the end', () => {
    expect(() => engine.format(document, 10, 5, Attributes.bold)).toThrow(
      'Format range [10, 15) exceeds document length 12'
    )
  })

  it('should reject negative and fractional ranges', () => {
    expect(() => engine.format(document, -1, 2, Attributes.bold)).toThrow(ContractViolationError)
    expect(() => engine.format(document, 0, -2, Attributes.bold)).toThrow(ContractViolationError)
    expect(() => engine.format(document, 0.5, 1, Attributes.bold)).toThrow(ContractViolationError)
  })

  it('should reject attributes whose scope disagrees with the catalog', () => {
    const inlineHeader = new Attribute('header', AttributeScope.INLINE, 1)

    expect(() => engine.format(new Delta().insert('Hello\n'), 0, 5, inlineHeader)).toThrow(ContractViolationError)
    expect(() => engine.format(new Delta().insert('Hello\n'), 0, 5, inlineHeader)).toThrow(
      'Attribute header has scope inline but the catalog defines block'
    )
  })

  it('should take the given scope for keys outside the catalog', () => {
    const mention = new Attribute('mention', AttributeScope.INLINE, 'ada')

    expect(engine.format(new Delta().insert('Hello\n'), 0, 5, mention).toJSON()).toEqual([
      { retain: 5, attributes: { mention: 'ada' } }
    ])
  })

  it('should check the range without measuring the whole document', () => {
    const long = new Delta().insert('Hello').insert('\n', { header: 1 }).insert('World\n')
    const measure = vi.spyOn(long, 'length')

    engine.format(long, 0, 2, Attributes.bold)

    expect(measure).not.toHaveBeenCalled()
  })

  it('should propagate rule contract violations', () => {
    expect(() => engine.format(document, 0, 3, Attributes.style('width: 100'))).toThrow(ContractViolationError)
  })
})
