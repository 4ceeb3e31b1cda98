/**
 * Attribute map utilities
 *
 * Attribute maps are the `attributes` objects carried by insert and retain
 * operations. A `null` value is meaningful on retains only: it clears the
 * attribute when the retain is composed onto content.
 */

import type { AttributeMap } from './operation'

export const AttributeMapUtils = {
  /**
   * Apply `b` on top of `a`
   *
   * Values from `b` win. With `keepNull` false (composing onto content),
   * null values are dropped so cleared attributes disappear; with
   * `keepNull` true (composing two retains) they survive as clear markers.
   *
   * @returns The composed map, or undefined when nothing is left
   */
  compose(
    a: AttributeMap | undefined,
    b: AttributeMap | undefined,
    keepNull: boolean
  ): AttributeMap | undefined {
    const attributes: AttributeMap = { ...(b ?? {}) }

    if (!keepNull) {
      for (const key of Object.keys(attributes)) {
        if (attributes[key] === null) {
          delete attributes[key]
        }
      }
    }

    if (a) {
      for (const [key, value] of Object.entries(a)) {
        if (b === undefined || !(key in b)) {
          attributes[key] = value
        }
      }
    }

    return AttributeMapUtils.isEmpty(attributes) ? undefined : attributes
  },

  /**
   * Check if two attribute maps are equal
   *
   * Missing maps and empty maps are equal. Null entries are compared like
   * any other value.
   */
  equals(a: AttributeMap | undefined, b: AttributeMap | undefined): boolean {
    const keysA = a ? Object.keys(a) : []
    const keysB = b ? Object.keys(b) : []

    if (keysA.length !== keysB.length) {
      return false
    }

    for (const key of keysA) {
      if (!b || !(key in b) || a?.[key] !== b[key]) {
        return false
      }
    }

    return true
  },

  isEmpty(attrs: AttributeMap | undefined): boolean {
    return attrs === undefined || Object.keys(attrs).length === 0
  },

  /**
   * Entries present with the same value in both maps
   */
  intersect(a: AttributeMap, b: AttributeMap): AttributeMap {
    const result: AttributeMap = {}

    for (const [key, value] of Object.entries(a)) {
      if (key in b && b[key] === value) {
        result[key] = value
      }
    }

    return result
  },

  /**
   * Drop null entries, which only make sense on retains
   */
  withoutNulls(attrs: AttributeMap): AttributeMap {
    const result: AttributeMap = {}

    for (const [key, value] of Object.entries(attrs)) {
      if (value !== null) {
        result[key] = value
      }
    }

    return result
  },

  clone(attrs: AttributeMap): AttributeMap {
    return { ...attrs }
  },

  /**
   * Create a human-readable string representation
   */
  toString(attrs: AttributeMap | undefined): string {
    if (!attrs || Object.keys(attrs).length === 0) {
      return '[none]'
    }

    const parts = Object.entries(attrs).map(([key, value]) =>
      value === true ? key : `${key}:${value === null ? 'null' : String(value)}`
    )

    return `[${parts.join(', ')}]`
  }
}
