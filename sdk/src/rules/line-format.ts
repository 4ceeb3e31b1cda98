/**
 * Line (block) format rule
 *
 * Block attributes live on the newline that terminates a line, so the patch
 * only restyles newline characters: every newline inside the range, plus the
 * first newline after it, which terminates the range's last line.
 */

import { AttributeScope, type Attribute } from '../attributes/attribute'
import type { AttributeCatalog } from '../attributes/catalog'
import { Delta } from '../delta/delta'
import { DeltaIterator } from '../delta/iterator'
import { operationLength, operationText, type AttributeMap, type Operation } from '../delta/operation'
import type { FormatRule } from './format-rule'

export const resolveLineFormat: FormatRule = {
  name: 'resolve-line-format',

  apply({ document, index, length, attribute, catalog }) {
    if (attribute.scope !== AttributeScope.BLOCK) {
      return null
    }

    let result = new Delta().retain(index)
    const iter = new DeltaIterator(document)
    iter.skip(index)

    let consumed = 0
    while (consumed < length && iter.hasNext()) {
      const op = iter.next(length - consumed)
      consumed += operationLength(op)
      const text = operationText(op)

      if (!text.includes('\n')) {
        result.retain(operationLength(op))
        continue
      }

      result = result.concat(styleNewlines(text, op, attribute, catalog, false))
    }

    // The newline closing the range's last line may sit past the range
    while (iter.hasNext()) {
      const op = iter.next()
      const text = operationText(op)

      if (!text.includes('\n')) {
        result.retain(operationLength(op))
        continue
      }

      result = result.concat(styleNewlines(text, op, attribute, catalog, true))
      break
    }

    return result
  }
}

/**
 * Retain `text`, restyling its newlines (only the first with `firstOnly`)
 */
function styleNewlines(
  text: string,
  op: Operation,
  attribute: Attribute,
  catalog: AttributeCatalog,
  firstOnly: boolean
): Delta {
  const delta = new Delta()
  const style: AttributeMap = { ...attribute.toJSON(), ...clearedSiblings(attribute, op, catalog) }
  let offset = 0
  let lineBreak = text.indexOf('\n')

  while (lineBreak >= 0) {
    delta.retain(lineBreak - offset).retain(1, style)

    if (firstOnly) {
      return delta
    }

    offset = lineBreak + 1
    lineBreak = text.indexOf('\n', offset)
  }

  return delta.retain(text.length - offset)
}

/**
 * `key: null` for every other member of the attribute's exclusion group set
 * on the operation. Removing an attribute clears nothing else.
 */
function clearedSiblings(attribute: Attribute, op: Operation, catalog: AttributeCatalog): AttributeMap {
  const cleared: AttributeMap = {}
  const group = catalog.exclusiveGroup(attribute.key)

  if (!group || attribute.value === null || !('attributes' in op) || !op.attributes) {
    return cleared
  }

  for (const key of Object.keys(op.attributes)) {
    if (key !== attribute.key && group.has(key)) {
      cleared[key] = null
    }
  }

  return cleared
}
