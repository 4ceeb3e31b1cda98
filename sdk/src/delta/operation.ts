/**
 * Delta operations
 *
 * A Delta is built from three kinds of operations:
 * - insert: { insert: "text" | { image: "..." }, attributes?: {...} }
 * - retain: { retain: length, attributes?: {...} } (keep, optionally restyle)
 * - delete: { delete: length }
 *
 * @module delta/operation
 */

/**
 * Attribute values carried by operations.
 * `null` on a retain means "clear this attribute".
 */
export type AttributeValue = string | number | boolean | null

export type AttributeMap = Record<string, AttributeValue>

/**
 * Non-text content occupying a single unit, e.g. `{ image: 'cat.png' }`
 */
export type Embed = Record<string, unknown>

export type InsertOp = {
  insert: string | Embed
  attributes?: AttributeMap
}

export type RetainOp = {
  retain: number
  attributes?: AttributeMap
}

export type DeleteOp = {
  delete: number
}

export type Operation = InsertOp | RetainOp | DeleteOp

export type OperationType = 'insert' | 'retain' | 'delete'

export function isInsert(op: Operation): op is InsertOp {
  return 'insert' in op
}

export function isRetain(op: Operation): op is RetainOp {
  return 'retain' in op
}

export function isDelete(op: Operation): op is DeleteOp {
  return 'delete' in op
}

export function isTextInsert(op: Operation): op is InsertOp & { insert: string } {
  return isInsert(op) && typeof op.insert === 'string'
}

export function isEmbedInsert(op: Operation): op is InsertOp & { insert: Embed } {
  return isInsert(op) && typeof op.insert !== 'string'
}

export function operationType(op: Operation): OperationType {
  if (isInsert(op)) return 'insert'
  if (isRetain(op)) return 'retain'
  return 'delete'
}

/**
 * Length of an operation in document units.
 * Embeds always count as one unit.
 */
export function operationLength(op: Operation): number {
  if (isDelete(op)) {
    return op.delete
  }
  if (isRetain(op)) {
    return op.retain
  }
  return typeof op.insert === 'string' ? op.insert.length : 1
}

/**
 * Text carried by an operation, or '' for embeds, retains and deletes.
 * Rules use this to look for newlines.
 */
export function operationText(op: Operation): string {
  return isTextInsert(op) ? op.insert : ''
}

export function hasAttribute(op: Operation, key: string): boolean {
  return !isDelete(op) && op.attributes !== undefined && key in op.attributes
}

/**
 * Copy of an insert's content; embeds get a fresh object
 */
export function copyInsert(insert: string | Embed): string | Embed {
  return typeof insert === 'string' ? insert : { ...insert }
}

/**
 * Cut `length` units starting at `offset` out of an operation.
 * The attribute map and embed are copied.
 */
export function sliceOperation(op: Operation, offset: number, length: number): Operation {
  if (isDelete(op)) {
    return { delete: length }
  }

  const attributes = op.attributes ? { ...op.attributes } : undefined

  if (isRetain(op)) {
    return attributes ? { retain: length, attributes } : { retain: length }
  }

  const insert = typeof op.insert === 'string'
    ? op.insert.substring(offset, offset + length)
    : copyInsert(op.insert)

  return attributes ? { insert, attributes } : { insert }
}

export function cloneOperation(op: Operation): Operation {
  return sliceOperation(op, 0, operationLength(op))
}
