/**
 * Attribute Catalog
 *
 * Static lookup of the known attribute keys: the scope of each key and the
 * block-level exclusion groups. Setting a key from an exclusion group on a
 * line clears every other key of that group on the same line.
 *
 * Catalogs are immutable; extend() returns a new catalog.
 */

import { Attribute, AttributeScope } from './attribute'
import type { AttributeValue } from '../delta/operation'
import { UnknownAttributeError } from '../types'

export interface AttributeDefinition {
  key: string
  scope: AttributeScope
  /** Name of the block-level exclusion group the key belongs to */
  exclusiveGroup?: string
}

/** Header, list, code block and blockquote: at most one per line */
export const BLOCK_TYPE_GROUP = 'block-type'

export const AttributeKeys = {
  bold: 'bold',
  italic: 'italic',
  small: 'small',
  underline: 'underline',
  strike: 'strike',
  code: 'code',
  font: 'font',
  size: 'size',
  link: 'link',
  color: 'color',
  background: 'background',
  placeholder: 'placeholder',
  script: 'script',
  header: 'header',
  indent: 'indent',
  align: 'align',
  list: 'list',
  codeBlock: 'code-block',
  blockquote: 'blockquote',
  direction: 'direction',
  style: 'style',
  width: 'width',
  height: 'height'
} as const

const DEFAULT_DEFINITIONS: readonly AttributeDefinition[] = [
  { key: AttributeKeys.bold, scope: AttributeScope.INLINE },
  { key: AttributeKeys.italic, scope: AttributeScope.INLINE },
  { key: AttributeKeys.small, scope: AttributeScope.INLINE },
  { key: AttributeKeys.underline, scope: AttributeScope.INLINE },
  { key: AttributeKeys.strike, scope: AttributeScope.INLINE },
  { key: AttributeKeys.code, scope: AttributeScope.INLINE },
  { key: AttributeKeys.font, scope: AttributeScope.INLINE },
  { key: AttributeKeys.size, scope: AttributeScope.INLINE },
  { key: AttributeKeys.link, scope: AttributeScope.INLINE },
  { key: AttributeKeys.color, scope: AttributeScope.INLINE },
  { key: AttributeKeys.background, scope: AttributeScope.INLINE },
  { key: AttributeKeys.placeholder, scope: AttributeScope.INLINE },
  { key: AttributeKeys.script, scope: AttributeScope.INLINE },
  { key: AttributeKeys.header, scope: AttributeScope.BLOCK, exclusiveGroup: BLOCK_TYPE_GROUP },
  { key: AttributeKeys.indent, scope: AttributeScope.BLOCK },
  { key: AttributeKeys.align, scope: AttributeScope.BLOCK },
  { key: AttributeKeys.list, scope: AttributeScope.BLOCK, exclusiveGroup: BLOCK_TYPE_GROUP },
  { key: AttributeKeys.codeBlock, scope: AttributeScope.BLOCK, exclusiveGroup: BLOCK_TYPE_GROUP },
  { key: AttributeKeys.blockquote, scope: AttributeScope.BLOCK, exclusiveGroup: BLOCK_TYPE_GROUP },
  { key: AttributeKeys.direction, scope: AttributeScope.BLOCK },
  { key: AttributeKeys.style, scope: AttributeScope.EMBED },
  { key: AttributeKeys.width, scope: AttributeScope.EMBED },
  { key: AttributeKeys.height, scope: AttributeScope.EMBED }
]

export class AttributeCatalog {
  private readonly definitions: ReadonlyMap<string, AttributeDefinition>
  private readonly groups: ReadonlyMap<string, ReadonlySet<string>>

  constructor(definitions: readonly AttributeDefinition[] = DEFAULT_DEFINITIONS) {
    const byKey = new Map<string, AttributeDefinition>()
    for (const definition of definitions) {
      byKey.set(definition.key, { ...definition })
    }

    const groups = new Map<string, Set<string>>()
    for (const definition of byKey.values()) {
      if (!definition.exclusiveGroup) continue
      const members = groups.get(definition.exclusiveGroup) ?? new Set<string>()
      members.add(definition.key)
      groups.set(definition.exclusiveGroup, members)
    }

    this.definitions = byKey
    this.groups = groups
  }

  has(key: string): boolean {
    return this.definitions.has(key)
  }

  get(key: string): AttributeDefinition | undefined {
    return this.definitions.get(key)
  }

  scope(key: string): AttributeScope | undefined {
    return this.definitions.get(key)?.scope
  }

  /**
   * Every key sharing `key`'s exclusion group, `key` included
   */
  exclusiveGroup(key: string): ReadonlySet<string> | undefined {
    const group = this.definitions.get(key)?.exclusiveGroup
    return group === undefined ? undefined : this.groups.get(group)
  }

  keys(): string[] {
    return [...this.definitions.keys()]
  }

  /**
   * Build an attribute for a known key
   *
   * @throws UnknownAttributeError if the key is not in the catalog
   */
  attribute<V extends AttributeValue>(key: string, value: V | null): Attribute<V> {
    const scope = this.scope(key)
    if (scope === undefined) {
      throw new UnknownAttributeError(key)
    }
    return new Attribute(key, scope, value)
  }

  /**
   * New catalog with extra (or redefined) keys
   */
  extend(definitions: readonly AttributeDefinition[]): AttributeCatalog {
    return new AttributeCatalog([...this.definitions.values(), ...definitions])
  }
}

export const defaultCatalog = new AttributeCatalog()

export type ListType = 'bullet' | 'ordered' | 'checked' | 'unchecked'

export type Alignment = 'left' | 'center' | 'right' | 'justify'

/**
 * Preset attributes for common use cases
 */
export const Attributes = {
  bold: defaultCatalog.attribute(AttributeKeys.bold, true),
  italic: defaultCatalog.attribute(AttributeKeys.italic, true),
  small: defaultCatalog.attribute(AttributeKeys.small, true),
  underline: defaultCatalog.attribute(AttributeKeys.underline, true),
  strike: defaultCatalog.attribute(AttributeKeys.strike, true),
  code: defaultCatalog.attribute(AttributeKeys.code, true),
  bulletList: defaultCatalog.attribute<ListType>(AttributeKeys.list, 'bullet'),
  orderedList: defaultCatalog.attribute<ListType>(AttributeKeys.list, 'ordered'),
  checked: defaultCatalog.attribute<ListType>(AttributeKeys.list, 'checked'),
  unchecked: defaultCatalog.attribute<ListType>(AttributeKeys.list, 'unchecked'),
  codeBlock: defaultCatalog.attribute(AttributeKeys.codeBlock, true),
  blockquote: defaultCatalog.attribute(AttributeKeys.blockquote, true),

  link(url: string | null): Attribute<string> {
    return defaultCatalog.attribute(AttributeKeys.link, url)
  },

  color(hex: string | null): Attribute<string> {
    return defaultCatalog.attribute(AttributeKeys.color, hex)
  },

  background(hex: string | null): Attribute<string> {
    return defaultCatalog.attribute(AttributeKeys.background, hex)
  },

  header(level: number | null): Attribute<number> {
    return defaultCatalog.attribute(AttributeKeys.header, level)
  },

  indent(level: number | null): Attribute<number> {
    return defaultCatalog.attribute(AttributeKeys.indent, level)
  },

  align(alignment: Alignment | null): Attribute<Alignment> {
    return defaultCatalog.attribute(AttributeKeys.align, alignment)
  },

  direction(direction: 'rtl' | null): Attribute<'rtl'> {
    return defaultCatalog.attribute(AttributeKeys.direction, direction)
  },

  /** CSS-like style string for embeds, e.g. 'width: 120; height: 80' */
  style(css: string | null): Attribute<string> {
    return defaultCatalog.attribute(AttributeKeys.style, css)
  },

  width(value: number | null): Attribute<number> {
    return defaultCatalog.attribute(AttributeKeys.width, value)
  },

  height(value: number | null): Attribute<number> {
    return defaultCatalog.attribute(AttributeKeys.height, value)
  }
}
