/**
 * Format attributes
 *
 * An attribute is a key, a value and the scope it applies to:
 * - block: anchored to a line's terminating newline (header, list, ...)
 * - inline: applied to runs of text (bold, link, ...)
 * - embed: applied to a single embedded object (style, width, ...)
 */

import type { AttributeMap, AttributeValue } from '../delta/operation'

export enum AttributeScope {
  BLOCK = 'block',
  INLINE = 'inline',
  EMBED = 'embed'
}

export class Attribute<V extends AttributeValue = AttributeValue> {
  constructor(
    readonly key: string,
    readonly scope: AttributeScope,
    readonly value: V | null
  ) {}

  /**
   * Same key and scope with another value; `null` marks removal
   */
  static clone<T extends AttributeValue>(origin: Attribute<T>, value: T | null): Attribute<T> {
    return new Attribute(origin.key, origin.scope, value)
  }

  get isUnset(): boolean {
    return this.value === null
  }

  equals(other: Attribute): boolean {
    return this.key === other.key && this.scope === other.scope && this.value === other.value
  }

  /**
   * Attribute map form carried by operations, e.g. `{ header: 1 }`
   */
  toJSON(): AttributeMap {
    return { [this.key]: this.value }
  }

  toString(): string {
    return `Attribute{key: ${this.key}, scope: ${this.scope}, value: ${String(this.value)}}`
  }
}
