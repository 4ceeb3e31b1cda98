/**
 * Link format at a collapsed caret
 *
 * With no selection, a link request edits the link run touching the caret:
 * the operation ending at the caret and the one starting there are
 * restyled when they already carry a link.
 */

import { AttributeKeys } from '../attributes/catalog'
import { Delta } from '../delta/delta'
import { DeltaIterator } from '../delta/iterator'
import { hasAttribute, operationLength } from '../delta/operation'
import type { FormatRule } from './format-rule'

export const formatLinkAtCaret: FormatRule = {
  name: 'format-link-at-caret',

  apply({ document, index, length, attribute }) {
    if (attribute.key !== AttributeKeys.link || length > 0) {
      return null
    }

    const iter = new DeltaIterator(document)
    const before = iter.skip(index)
    const after = iter.hasNext() ? iter.next() : null

    let start = index
    let retain = 0

    if (before && hasAttribute(before, attribute.key)) {
      start -= operationLength(before)
      retain = operationLength(before)
    }

    if (after && hasAttribute(after, attribute.key)) {
      retain += operationLength(after)
    }

    if (retain === 0) {
      return null
    }

    return new Delta().retain(start).retain(retain, attribute.toJSON())
  }
}
