/**
 * Converts one decoded field value into the text form handed to callers.
 * A codec signals failure by throwing.
 */
export type FieldCodec = (value: string) => string

/**
 * A field whose value could not be converted. Never thrown; the raw value is
 * kept and the page carries on.
 */
export interface EncodingWarning {
  field: string
  value: string
  reason: string
}

export type EncodingWarningHandler = (warning: EncodingWarning) => void

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

/**
 * Default codec: NFC normalization. Strings carrying an unpaired surrogate
 * have no valid encoding and are rejected.
 */
export const normalizeUnicode: FieldCodec = (value) => {
  if (UNPAIRED_SURROGATE.test(value)) {
    throw new Error('value contains an unpaired surrogate')
  }
  return value.normalize('NFC')
}

export function transcodeField(
  field: string,
  value: string,
  codec: FieldCodec = normalizeUnicode,
  onWarning?: EncodingWarningHandler
): string {
  try {
    return codec(value)
  } catch (error) {
    onWarning?.({
      field,
      value,
      reason: error instanceof Error ? error.message : String(error),
    })
    return value
  }
}
