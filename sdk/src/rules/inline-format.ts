/**
 * Inline format rule: style every unit of the range except newlines.
 */

import { AttributeScope } from '../attributes/attribute'
import { Delta } from '../delta/delta'
import { DeltaIterator } from '../delta/iterator'
import { operationLength, operationText } from '../delta/operation'
import type { FormatRule } from './format-rule'

export const resolveInlineFormat: FormatRule = {
  name: 'resolve-inline-format',

  apply({ document, index, length, attribute }) {
    if (attribute.scope !== AttributeScope.INLINE) {
      return null
    }

    const style = attribute.toJSON()
    const delta = new Delta().retain(index)
    const iter = new DeltaIterator(document)
    iter.skip(index)

    let consumed = 0
    while (consumed < length && iter.hasNext()) {
      const op = iter.next(length - consumed)
      const opLength = operationLength(op)
      consumed += opLength

      const text = operationText(op)
      let lineBreak = text.indexOf('\n')

      if (lineBreak < 0) {
        delta.retain(opLength, style)
        continue
      }

      let pos = 0
      while (lineBreak >= 0) {
        delta.retain(lineBreak - pos, style).retain(1)
        pos = lineBreak + 1
        lineBreak = text.indexOf('\n', pos)
      }

      if (pos < opLength) {
        delta.retain(opLength - pos, style)
      }
    }

    return delta
  }
}
