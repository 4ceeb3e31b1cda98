/**
 * Style attribute on a single embed (image, video, ...)
 */

import { AttributeKeys } from '../attributes/catalog'
import { Delta } from '../delta/delta'
import { ContractViolationError } from '../types'
import type { FormatRule } from './format-rule'

export const resolveEmbedStyle: FormatRule = {
  name: 'resolve-embed-style',

  apply({ index, length, attribute, data }) {
    if (attribute.key !== AttributeKeys.style) {
      return null
    }

    if (length !== 1 || (data !== undefined && data !== null)) {
      throw new ContractViolationError(
        `Embed style applies to exactly one embed without payload (length ${length}, payload ${data === undefined || data === null ? 'none' : 'given'})`
      )
    }

    return new Delta().retain(index).retain(1, attribute.toJSON())
  }
}
