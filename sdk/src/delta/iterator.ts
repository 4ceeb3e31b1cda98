/**
 * DeltaIterator - forward cursor over a Delta's operations
 *
 * Consumes a Delta in bounded steps, splitting operations where a step ends
 * inside one. Used to align a requested range against the document's
 * existing operation boundaries.
 *
 * @module delta/iterator
 */

import type { Delta } from './delta'
import {
  operationLength,
  operationType,
  sliceOperation,
  type Operation,
  type OperationType
} from './operation'
import { ContractViolationError, IteratorExhaustedError } from '../types'

/**
 * Cursor state: which operation, and how far into it
 */
export interface CursorPosition {
  readonly index: number
  readonly offset: number
}

export class DeltaIterator {
  private readonly ops: readonly Operation[]
  private index: number
  private offset: number

  constructor(source: Delta | readonly Operation[], position: CursorPosition = { index: 0, offset: 0 }) {
    this.ops = 'ops' in source ? source.ops : source
    this.index = position.index
    this.offset = position.offset
  }

  hasNext(): boolean {
    return this.index < this.ops.length
  }

  /**
   * Current operation, unconsumed part included
   */
  peek(): Operation | undefined {
    return this.ops[this.index]
  }

  /**
   * Units left in the current operation, Infinity once exhausted
   */
  peekLength(): number {
    const op = this.ops[this.index]
    return op ? operationLength(op) - this.offset : Infinity
  }

  /**
   * Kind of the current operation; an exhausted iterator reads as an
   * endless retain
   */
  peekType(): OperationType {
    const op = this.ops[this.index]
    return op ? operationType(op) : 'retain'
  }

  /**
   * Consume up to `maxLength` units of the current operation
   *
   * @param maxLength - Upper bound, the whole remainder when omitted
   * @returns The consumed piece
   * @throws IteratorExhaustedError when nothing is left
   */
  next(maxLength?: number): Operation {
    const op = this.ops[this.index]
    if (!op) {
      throw new IteratorExhaustedError()
    }
    if (maxLength !== undefined && !(maxLength > 0)) {
      throw new ContractViolationError(`next() needs a positive length, got ${maxLength}`)
    }

    const offset = this.offset
    const remaining = operationLength(op) - offset
    const length = maxLength === undefined ? remaining : Math.min(maxLength, remaining)

    if (length === remaining) {
      this.index += 1
      this.offset = 0
    } else {
      this.offset += length
    }

    return sliceOperation(op, offset, length)
  }

  /**
   * Advance exactly `length` units (or to the end of the Delta)
   *
   * @returns The last, possibly partial, operation consumed; null when
   *   `length` is not positive
   */
  skip(length: number): Operation | null {
    let skipped = 0
    let op: Operation | null = null

    while (skipped < length && this.hasNext()) {
      op = this.next(length - skipped)
      skipped += operationLength(op)
    }

    return op
  }

  /**
   * Everything not consumed yet, without moving the cursor
   */
  rest(): Operation[] {
    if (!this.hasNext()) {
      return []
    }

    const fork = this.clone()
    const ops: Operation[] = [fork.next()]
    while (fork.hasNext()) {
      ops.push(fork.next())
    }
    return ops
  }

  position(): CursorPosition {
    return { index: this.index, offset: this.offset }
  }

  /**
   * Independent cursor at the same position
   */
  clone(): DeltaIterator {
    return new DeltaIterator(this.ops, this.position())
  }
}
