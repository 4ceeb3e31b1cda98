/**
 * Delta serialization
 *
 * The JSON ops list is the interchange form used for storage, the clipboard
 * and autosave. Large payloads can be lz-string compressed; compressed text
 * is tagged with a `lz:` prefix so decode() recognizes either form.
 */

import LZString from 'lz-string'
import { Delta } from './delta'
import { deltaJSONSchema, describeIssue } from './schema'
import { DeltaFormatError } from '../types'

const COMPRESSED_PREFIX = 'lz:'

export interface EncodeOptions {
  /** Compress with lz-string (default: false) */
  compress?: boolean
}

export const DeltaCodec = {
  /**
   * Serialize a Delta to text
   */
  encode(delta: Delta, options: EncodeOptions = {}): string {
    const json = JSON.stringify(delta.toJSON())
    if (!options.compress) {
      return json
    }
    return COMPRESSED_PREFIX + LZString.compressToBase64(json)
  },

  /**
   * Parse text produced by encode()
   *
   * @throws DeltaFormatError if the text is not a serialized Delta
   */
  decode(payload: string): Delta {
    let json = payload

    if (payload.startsWith(COMPRESSED_PREFIX)) {
      const decompressed = LZString.decompressFromBase64(payload.slice(COMPRESSED_PREFIX.length))
      if (!decompressed) {
        throw new DeltaFormatError('Compressed delta could not be decompressed')
      }
      json = decompressed
    }

    let value: unknown
    try {
      value = JSON.parse(json)
    } catch (error) {
      throw new DeltaFormatError(
        `Delta is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      )
    }

    return Delta.fromJSON(value)
  },

  isCompressed(payload: string): boolean {
    return payload.startsWith(COMPRESSED_PREFIX)
  }
}

export const DeltaUtils = {
  /**
   * Validate Delta structure
   *
   * Checks if a value is a well-formed Delta in wire form.
   * Returns error message if invalid, undefined if valid.
   */
  validate(value: unknown): string | undefined {
    const result = deltaJSONSchema.safeParse(value)
    return result.success ? undefined : describeIssue(result.error)
  },

  /**
   * Create an empty document (a single newline)
   */
  emptyDocument(): Delta {
    return new Delta().insert('\n')
  }
}
