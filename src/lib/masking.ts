/**
 * Masking of secret option values before they reach a log line or a result
 */

import type { ConfigValue, RawValue, SchemaOption } from '../types.js'

export interface MaskOptions {
  /** Characters visible at start (default: 2) */
  visibleStart?: number
  /** Characters visible at end (default: 2) */
  visibleEnd?: number
  /** Minimum length to show any edge at all (default: 8) */
  minLengthToMask?: number
}

/**
 * Mask a sensitive value for display
 *
 * @example
 * maskValue('hunter2-password') // => 'hu****rd'
 * maskValue('short')            // => '***'
 */
export function maskValue(value: string | undefined | null, options: MaskOptions = {}): string {
  if (value === undefined || value === null || value === '') {
    return ''
  }

  const { visibleStart = 2, visibleEnd = 2, minLengthToMask = 8 } = options

  if (value.length < minLengthToMask) {
    return '***'
  }

  const end = visibleEnd > 0 ? value.slice(-visibleEnd) : ''
  return `${value.slice(0, visibleStart)}****${end}`
}

/**
 * Render an option value for logs: secrets masked, lists joined
 */
export function displayValue(option: Pick<SchemaOption, 'type'>, value: ConfigValue | RawValue | undefined): string {
  if (value === undefined) return '(unset)'
  const text = Array.isArray(value) ? `[${value.join(', ')}]` : String(value)
  return option.type === 'secret' ? maskValue(text) : text
}
