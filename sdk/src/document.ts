/**
 * RichDocument - authoritative rich text document
 *
 * Holds the document Delta (inserts only, always ending with a newline),
 * routes format requests through the rule engine and composes the
 * resulting patches into itself.
 *
 * @example
 * ```typescript
 * const doc = new RichDocument('Hello\nWorld\n')
 *
 * doc.subscribe(({ change }) => {
 *   console.log('Changed:', change.toJSON())
 * })
 *
 * doc.format(0, 5, Attributes.header(1))
 * doc.format(6, 5, Attributes.bold)
 *
 * console.log(doc.getSelectionStyle(6, 5)) // { bold: true }
 * ```
 *
 * @module document
 */

import { Attribute } from './attributes/attribute'
import { AttributeKeys, Attributes, defaultCatalog } from './attributes/catalog'
import { loadConfig, type QuireConfig, type QuireConfigInput } from './config'
import { AttributeMapUtils } from './delta/attribute-map'
import { DeltaCodec } from './delta/codec'
import { Delta } from './delta/delta'
import {
  isInsert,
  isTextInsert,
  operationText,
  type AttributeMap,
  type Embed,
  type Operation
} from './delta/operation'
import { createLogger, type Logger } from './logger'
import { FormatRuleEngine } from './rules/engine'
import {
  ContractViolationError,
  DocumentError,
  UnknownAttributeError,
  type SubscriptionCallback,
  type Unsubscribe
} from './types'

export type ChangeSource = 'format' | 'insert' | 'delete'

export interface DocumentChange {
  /** Patch that was composed into the document */
  change: Delta
  before: Delta
  after: Delta
  source: ChangeSource
}

export interface RichDocumentOptions {
  config?: QuireConfigInput
  /** Engine to use instead of one built from the configuration */
  engine?: FormatRuleEngine
}

export class RichDocument {
  readonly config: QuireConfig
  readonly engine: FormatRuleEngine
  private content: Delta
  private readonly subscribers = new Set<SubscriptionCallback<DocumentChange>>()
  private readonly logger: Logger

  constructor(content?: string | Delta, options: RichDocumentOptions = {}) {
    this.config = loadConfig(options.config)
    this.logger = createLogger('document', { debug: this.config.debug })
    this.engine = options.engine ?? new FormatRuleEngine({
      catalog: defaultCatalog.extend(this.config.attributes),
      logger: createLogger('rules', { debug: this.config.debug })
    })
    this.content = toDocument(content)
  }

  /**
   * Restore a document from its wire form
   */
  static fromJSON(json: unknown, options?: RichDocumentOptions): RichDocument {
    return new RichDocument(Delta.fromJSON(json), options)
  }

  /**
   * Restore a document from snapshot()
   */
  static restore(snapshot: string, options?: RichDocumentOptions): RichDocument {
    return new RichDocument(DeltaCodec.decode(snapshot), options)
  }

  /**
   * Copy of the document Delta
   */
  get delta(): Delta {
    return new Delta(this.content.ops)
  }

  length(): number {
    return this.content.length()
  }

  toPlainText(): string {
    return this.content.toPlainText()
  }

  toJSON(): Operation[] {
    return this.content.toJSON()
  }

  /**
   * Serialized document, lz-string compressed once its JSON reaches the
   * configured threshold
   */
  snapshot(): string {
    const json = DeltaCodec.encode(this.content)
    if (json.length < this.config.snapshot.compressThreshold) {
      return json
    }
    return DeltaCodec.encode(this.content, { compress: true })
  }

  /**
   * Apply an attribute to `[index, index + length)`
   *
   * @returns The patch that was composed into the document
   * @throws UnknownAttributeError in strict mode, for keys outside the catalog
   * @throws ContractViolationError if the range is outside the document
   */
  format(index: number, length: number, attribute: Attribute, data?: string | Embed | null): Delta {
    if (this.config.strict && !this.engine.catalog.has(attribute.key)) {
      throw new UnknownAttributeError(attribute.key)
    }

    const patch = this.engine.format(this.content, index, length, attribute, data)
    this.apply(patch, 'format')
    return patch
  }

  /**
   * Insert text or an embed before `index`
   *
   * @throws DocumentError when inserting after the final newline
   */
  insert(index: number, content: string | Embed, attributes?: AttributeMap): Delta {
    const length = this.content.length()
    if (!Number.isInteger(index) || index < 0 || index > length) {
      throw new ContractViolationError(`Insert index ${index} is outside the document (length ${length})`)
    }
    if (index === length) {
      throw new DocumentError('Cannot insert after the final newline')
    }

    const patch = new Delta().retain(index).insert(content, attributes)
    this.apply(patch, 'insert')
    return patch
  }

  /**
   * Delete `[index, index + length)`
   *
   * @throws DocumentError when the range includes the final newline
   */
  delete(index: number, length: number): Delta {
    const documentLength = this.content.length()
    if (!Number.isInteger(index) || !Number.isInteger(length) || index < 0 || length < 0 || index + length > documentLength) {
      throw new ContractViolationError(
        `Delete range [${index}, ${index + length}) is outside the document (length ${documentLength})`
      )
    }
    if (length > 0 && index + length === documentLength) {
      throw new DocumentError('Cannot delete the final newline')
    }

    const patch = new Delta().retain(index).delete(length)
    this.apply(patch, 'delete')
    return patch
  }

  /**
   * Attributes in effect for a selection
   *
   * Line attributes shared by every line the selection touches, merged with
   * the inline attributes shared by every non-newline unit it covers. For a
   * collapsed selection the inline part comes from the unit before the
   * caret (same line), else the unit after it.
   */
  getSelectionStyle(index: number, length: number = 0): AttributeMap {
    const lastTouched = length > 0 ? index + length - 1 : index
    const lineStyles: AttributeMap[] = []
    let lineStart = 0

    this.content.eachLine((line, attributes) => {
      const newlineAt = lineStart + line.length()
      if (newlineAt >= index && lineStart <= lastTouched) {
        lineStyles.push(attributes)
      }
      lineStart = newlineAt + 1
      return lineStart <= lastTouched
    })

    const inlineStyle = length > 0
      ? this.rangeInlineStyle(index, index + length)
      : this.caretInlineStyle(index)

    return { ...inlineStyle, ...intersectAll(lineStyles) }
  }

  /**
   * Turn the selected lines into an unchecked check list, or back into
   * plain lines when they already are a check list
   */
  toggleCheckList(index: number, length: number = 0): Delta {
    const list = this.getSelectionStyle(index, length)[AttributeKeys.list]
    const isCheckList = list === 'checked' || list === 'unchecked'

    return this.format(
      index,
      length,
      isCheckList ? Attribute.clone(Attributes.unchecked, null) : Attributes.unchecked
    )
  }

  /**
   * Subscribe to document changes
   *
   * @param callback - Called after every change that modified the document
   * @returns Unsubscribe function
   */
  subscribe(callback: SubscriptionCallback<DocumentChange>): Unsubscribe {
    this.subscribers.add(callback)

    return () => {
      this.subscribers.delete(callback)
    }
  }

  // ====================
  // Private helpers
  // ====================

  private apply(change: Delta, source: ChangeSource): void {
    const before = this.content
    const after = before.compose(change)

    if (after.isEqual(before)) {
      this.logger.debug(`${source} left the document unchanged`)
      return
    }

    this.content = after
    this.logger.debug(`${source} applied`, change.toJSON())
    this.notifySubscribers({ change, before, after, source })
  }

  private notifySubscribers(event: DocumentChange): void {
    this.subscribers.forEach(callback => {
      try {
        callback(event)
      } catch (error) {
        this.logger.error('Error in subscription callback:', error)
      }
    })
  }

  private rangeInlineStyle(start: number, end: number): AttributeMap {
    const styles: AttributeMap[] = []

    for (const op of this.content.slice(start, end).ops) {
      if (!isInsert(op)) continue
      const attributes = op.attributes ?? {}

      if (!isTextInsert(op)) {
        styles.push(attributes)
        continue
      }
      if (op.insert.split('\n').some(segment => segment.length > 0)) {
        styles.push(attributes)
      }
    }

    return intersectAll(styles)
  }

  private caretInlineStyle(index: number): AttributeMap {
    const previous = index > 0 ? this.content.slice(index - 1, index).ops[0] : undefined
    if (previous && operationText(previous) !== '\n') {
      return inlineAttributes(previous)
    }

    const next = this.content.slice(index, index + 1).ops[0]
    if (next && operationText(next) !== '\n') {
      return inlineAttributes(next)
    }

    return {}
  }
}

function toDocument(content: string | Delta | undefined): Delta {
  if (content === undefined) {
    return new Delta().insert('\n')
  }

  if (typeof content === 'string') {
    return new Delta().insert(content.endsWith('\n') ? content : `${content}\n`)
  }

  if (!content.ops.every(isInsert)) {
    throw new DocumentError('A document may only contain insert operations')
  }
  const lastOp = content.ops[content.ops.length - 1]
  if (!lastOp || !isTextInsert(lastOp) || !lastOp.insert.endsWith('\n')) {
    throw new DocumentError('A document must end with a newline')
  }

  return content.normalize()
}

function inlineAttributes(op: Operation): AttributeMap {
  return isInsert(op) && op.attributes ? { ...op.attributes } : {}
}

function intersectAll(maps: AttributeMap[]): AttributeMap {
  const [first, ...rest] = maps
  if (!first) {
    return {}
  }
  return rest.reduce((common, attrs) => AttributeMapUtils.intersect(common, attrs), { ...first })
}
