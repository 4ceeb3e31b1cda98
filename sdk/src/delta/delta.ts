/**
 * Delta - rich text documents and changes to them
 *
 * A document is a Delta made of inserts only, always ending with a newline.
 * A change (patch) is a Delta of retains, inserts and deletes that is
 * composed onto a document.
 *
 * Every builder call keeps the Delta normalized: adjacent operations of the
 * same kind with equal attributes are merged as they are appended.
 *
 * @see https://quilljs.com/docs/delta/
 * @module delta/delta
 */

import { AttributeMapUtils } from './attribute-map'
import { DeltaIterator } from './iterator'
import {
  cloneOperation,
  copyInsert,
  isDelete,
  isInsert,
  isRetain,
  isTextInsert,
  operationLength,
  type AttributeMap,
  type Embed,
  type Operation
} from './operation'
import { deltaJSONSchema, describeIssue } from './schema'
import { ContractViolationError, DeltaFormatError } from '../types'

export type LineCallback = (line: Delta, attributes: AttributeMap, index: number) => boolean | void

export class Delta {
  readonly ops: Operation[]

  /**
   * Wrap existing operations as they are (no normalization)
   */
  constructor(ops: readonly Operation[] = []) {
    this.ops = ops.map(cloneOperation)
  }

  /**
   * Rebuild a Delta from its wire form
   *
   * @param value - An ops list or an `{ ops }` envelope
   * @throws DeltaFormatError if the value is not a well-formed Delta
   */
  static fromJSON(value: unknown): Delta {
    const result = deltaJSONSchema.safeParse(value)
    if (!result.success) {
      throw new DeltaFormatError(describeIssue(result.error))
    }
    return new Delta(result.data)
  }

  insert(content: string | Embed, attributes?: AttributeMap): this {
    if (typeof content === 'string' && content.length === 0) {
      return this
    }
    return this.push(attributes ? { insert: content, attributes } : { insert: content })
  }

  retain(length: number, attributes?: AttributeMap): this {
    if (length <= 0) {
      return this
    }
    return this.push(attributes ? { retain: length, attributes } : { retain: length })
  }

  delete(length: number): this {
    if (length <= 0) {
      return this
    }
    return this.push({ delete: length })
  }

  /**
   * Append an operation, merging it into the last one when possible
   *
   * Inserts appended right after a delete are placed before it, so equal
   * changes always have equal operation lists.
   */
  push(newOp: Operation): this {
    const op = prepare(newOp)
    if (!op) {
      return this
    }

    let index = this.ops.length
    let lastOp = this.ops[index - 1]

    if (lastOp) {
      if (isDelete(op) && isDelete(lastOp)) {
        this.ops[index - 1] = { delete: lastOp.delete + op.delete }
        return this
      }

      if (isDelete(lastOp) && isInsert(op)) {
        index -= 1
        lastOp = this.ops[index - 1]
        if (!lastOp) {
          this.ops.unshift(op)
          return this
        }
      }

      if (!isDelete(op) && !isDelete(lastOp) && AttributeMapUtils.equals(op.attributes, lastOp.attributes)) {
        if (isTextInsert(op) && isTextInsert(lastOp)) {
          this.ops[index - 1] = withAttributes({ insert: lastOp.insert + op.insert }, op.attributes)
          return this
        }
        if (isRetain(op) && isRetain(lastOp)) {
          this.ops[index - 1] = withAttributes({ retain: lastOp.retain + op.retain }, op.attributes)
          return this
        }
      }
    }

    this.ops.splice(index, 0, op)
    return this
  }

  /**
   * Drop a trailing retain that changes nothing
   */
  chop(): this {
    const lastOp = this.ops[this.ops.length - 1]
    if (lastOp && isRetain(lastOp) && !lastOp.attributes) {
      this.ops.pop()
    }
    return this
  }

  /**
   * New Delta with `other`'s operations appended to this one's
   */
  concat(other: Delta): Delta {
    const delta = new Delta(this.ops)
    for (const op of other.ops) {
      delta.push(op)
    }
    return delta
  }

  /**
   * Apply `other` on top of this Delta
   *
   * Composing a patch onto a document yields the patched document.
   */
  compose(other: Delta): Delta {
    const thisIter = new DeltaIterator(this)
    const otherIter = new DeltaIterator(other)
    const delta = new Delta()

    while (thisIter.hasNext() && otherIter.hasNext()) {
      if (otherIter.peekType() === 'insert') {
        delta.push(otherIter.next())
        continue
      }
      if (thisIter.peekType() === 'delete') {
        delta.push(thisIter.next())
        continue
      }

      const length = Math.min(thisIter.peekLength(), otherIter.peekLength())
      const thisOp = thisIter.next(length)
      const otherOp = otherIter.next(length)

      if (isRetain(otherOp)) {
        if (isRetain(thisOp)) {
          const attributes = AttributeMapUtils.compose(thisOp.attributes, otherOp.attributes, true)
          delta.push(withAttributes({ retain: length }, attributes))
        } else if (isInsert(thisOp)) {
          const attributes = AttributeMapUtils.compose(thisOp.attributes, otherOp.attributes, false)
          delta.push(withAttributes({ insert: thisOp.insert }, attributes))
        }
      } else if (isDelete(otherOp) && isRetain(thisOp)) {
        delta.push(otherOp)
      }
      // delete over insert: both vanish
    }

    // Past the end of this Delta, other's operations apply as they are
    while (otherIter.hasNext()) {
      delta.push(otherIter.next())
    }
    while (thisIter.hasNext()) {
      delta.push(thisIter.next())
    }

    return delta.chop()
  }

  /**
   * Operations covering units `[start, end)`
   */
  slice(start: number = 0, end: number = Infinity): Delta {
    const ops: Operation[] = []
    const iter = new DeltaIterator(this)
    let index = 0

    while (index < end && iter.hasNext()) {
      let op: Operation
      if (index < start) {
        op = iter.next(start - index)
      } else {
        op = iter.next(end - index)
        ops.push(op)
      }
      index += operationLength(op)
    }

    return new Delta(ops)
  }

  /**
   * Walk a document line by line
   *
   * `fn` receives the line's content (newline excluded), the attributes of
   * its newline and the line number; returning `false` stops the walk.
   * Trailing content without a newline is reported with empty attributes.
   *
   * @throws ContractViolationError on a Delta that is not a document
   */
  eachLine(fn: LineCallback, newline: string = '\n'): void {
    const iter = new DeltaIterator(this)
    let line = new Delta()
    let i = 0

    while (iter.hasNext()) {
      const op = iter.peek()
      if (!op || !isInsert(op)) {
        throw new ContractViolationError('eachLine() works on documents (insert-only deltas)')
      }

      const start = operationLength(op) - iter.peekLength()
      const index = isTextInsert(op) ? op.insert.indexOf(newline, start) - start : -1

      if (index < 0) {
        line.push(iter.next())
      } else if (index > 0) {
        line.push(iter.next(index))
      } else {
        const newlineOp = iter.next(1)
        const attributes = isInsert(newlineOp) && newlineOp.attributes ? newlineOp.attributes : {}
        if (fn(line, attributes, i) === false) {
          return
        }
        i += 1
        line = new Delta()
      }
    }

    if (line.length() > 0) {
      fn(line, {}, i)
    }
  }

  /**
   * Sum of all operation lengths
   */
  length(): number {
    return this.ops.reduce((length, op) => length + operationLength(op), 0)
  }

  /**
   * Same operations re-appended through push()
   */
  normalize(): Delta {
    return this.ops.reduce((delta, op) => delta.push(op), new Delta())
  }

  isNormalized(): boolean {
    return this.normalize().isEqual(this)
  }

  isEqual(other: Delta): boolean {
    if (this.ops.length !== other.ops.length) {
      return false
    }
    return this.ops.every((op, i) => {
      const otherOp = other.ops[i]
      return otherOp !== undefined && operationsEqual(op, otherOp)
    })
  }

  /**
   * Convert to plain text (strip formatting and embeds)
   */
  toPlainText(): string {
    let text = ''
    for (const op of this.ops) {
      if (isTextInsert(op)) {
        text += op.insert
      }
    }
    return text
  }

  toJSON(): Operation[] {
    return this.ops.map(cloneOperation)
  }
}

/**
 * Copy of an operation ready to append, or null if it has no length.
 * Empty attribute maps are dropped, as are nulls on inserts.
 */
function prepare(op: Operation): Operation | null {
  if (operationLength(op) <= 0) {
    return null
  }
  if (isDelete(op)) {
    return { delete: op.delete }
  }

  const attributes = op.attributes && isInsert(op)
    ? AttributeMapUtils.withoutNulls(op.attributes)
    : op.attributes

  if (isRetain(op)) {
    return withAttributes({ retain: op.retain }, attributes && { ...attributes })
  }
  return withAttributes({ insert: copyInsert(op.insert) }, attributes && { ...attributes })
}

function withAttributes<T extends Operation>(op: T, attributes: AttributeMap | undefined): T {
  if (attributes && Object.keys(attributes).length > 0) {
    return { ...op, attributes }
  }
  return op
}

function operationsEqual(a: Operation, b: Operation): boolean {
  if (isDelete(a) || isDelete(b)) {
    return isDelete(a) && isDelete(b) && a.delete === b.delete
  }
  if (!AttributeMapUtils.equals(a.attributes, b.attributes)) {
    return false
  }
  if (isRetain(a) || isRetain(b)) {
    return isRetain(a) && isRetain(b) && a.retain === b.retain
  }
  if (typeof a.insert === 'string' || typeof b.insert === 'string') {
    return a.insert === b.insert
  }
  return JSON.stringify(a.insert) === JSON.stringify(b.insert)
}
