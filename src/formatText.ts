import { ValidationError } from './errors'
import { roundToMultiple } from './util'

export const DIMZIN_SUPPRESSES_LEADING_ZEROS = 4
export const DIMZIN_SUPPRESSES_TRAILING_ZEROS = 8

export interface TextFormat {
  /** rounds to a multiple of this value if > 0 */
  readonly dimrnd?: number
  /** fixed count of decimal places, unlimited if unset */
  readonly dimdec?: number
  /** zero suppression bits */
  readonly dimzin?: number
  readonly dimdsep?: string
  /** `<>` is replaced by the formatted value */
  readonly dimpost?: string
  readonly raiseDecimals?: boolean
}

export const suppressZeros = (text: string, leading = false, trailing = true) => {
  if (!leading && !trailing) {
    return text
  }
  if (+text === 0) {
    return '0'
  }
  const sign = text.startsWith('-') || text.startsWith('+') ? text[0] : ''
  let digits = sign ? text.slice(1) : text
  if (leading) {
    digits = digits.replace(/^0+/, '')
  }
  if (trailing && digits.includes('.')) {
    digits = digits.replace(/0+$/, '')
  }
  if (digits.endsWith('.')) {
    digits = digits.slice(0, -1)
  }
  return sign + digits
}

/** Decimal places as stacked superscript in MTEXT syntax. */
export const raiseDecimals = (text: string) => text.replace(/\.(\d+)/, '{\\H0.7x;\\S$1^ ;}')

export const formatText = (value: number, { dimrnd, dimdec, dimzin = 0, dimdsep = '.', dimpost = '<>', raiseDecimals: raise = false }: TextFormat = {}) => {
  if (dimrnd !== undefined) {
    value = roundToMultiple(value, dimrnd)
  }
  let text: string
  if (dimdec === undefined) {
    text = value.toFixed(6)
    dimzin |= DIMZIN_SUPPRESSES_TRAILING_ZEROS
  } else {
    text = value.toFixed(dimdec)
  }
  text = suppressZeros(text, (dimzin & DIMZIN_SUPPRESSES_LEADING_ZEROS) !== 0, (dimzin & DIMZIN_SUPPRESSES_TRAILING_ZEROS) !== 0)
  if (raise) {
    text = raiseDecimals(text)
  }
  if (dimdsep !== '.') {
    text = text.replace('.', dimdsep)
  }
  if (dimpost) {
    if (!dimpost.includes('<>')) {
      throw new ValidationError(`Invalid dimpost string: "${dimpost}"`)
    }
    const measurement = text
    text = dimpost.replace('<>', () => measurement)
  }
  return text
}
