/**
 * Delta: rich text documents and the changes applied to them
 *
 * - Operation: insert / retain / delete, with optional attributes
 * - Delta: normalized operation list with builders, concat and compose
 * - DeltaIterator: cursor splitting operations at arbitrary offsets
 * - DeltaCodec: JSON and compressed wire forms
 *
 * @packageDocumentation
 */

export { Delta } from './delta'
export type { LineCallback } from './delta'

export { DeltaIterator } from './iterator'
export type { CursorPosition } from './iterator'

export { AttributeMapUtils } from './attribute-map'

export { DeltaCodec, DeltaUtils } from './codec'
export type { EncodeOptions } from './codec'

export {
  isInsert,
  isRetain,
  isDelete,
  isTextInsert,
  isEmbedInsert,
  hasAttribute,
  operationLength,
  operationText,
  operationType
} from './operation'
export type {
  Operation,
  OperationType,
  InsertOp,
  RetainOp,
  DeleteOp,
  AttributeMap,
  AttributeValue,
  Embed
} from './operation'
