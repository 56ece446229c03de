import { getGroupCodeValue as $, type DxfRecordReadonly } from '@dxfom/dxf'
import type { Vec3 } from './vector'

export type Warn = (message: string, ...args: unknown[]) => void

export const round = (() => {
  const _shift = (n: number | string, precision: number): number => {
    const [d, e] = ('' + n).split('e')
    return +(d + 'e' + (e ? +e + precision : precision))
  }
  return (n: number | string, precision: number) => _shift(Math.round(_shift(n, precision)), -precision)
})()

export const roundToMultiple = (value: number, multiple: number) =>
  multiple > 0 ? Math.sign(value) * Math.round(Math.abs(value) / multiple) * multiple : value

export const trim = (s: string | undefined) => s ? s.trim() : s
export const $trim = (record: DxfRecordReadonly | undefined, groupCode: number) => trim($(record, groupCode))
export const $number = (record: DxfRecordReadonly | undefined, groupCode: number, defaultValue?: number) => {
  const raw = $(record, groupCode)
  const value = raw === undefined ? NaN : +raw
  if (isNaN(value)) {
    return defaultValue === undefined ? NaN : defaultValue
  }
  const rounded = Math.round(value)
  return Math.abs(rounded - value) < 1e-8 ? rounded : value
}
export const $point = (record: DxfRecordReadonly, groupCode: number): Vec3 | undefined => {
  if ($(record, groupCode) === undefined) {
    return
  }
  return [$number(record, groupCode, 0), $number(record, groupCode + 10, 0), $number(record, groupCode + 20, 0)]
}

export const escapeHtml = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;')

export const rotate = (angle: number, x: number, y: number) => (angle ? `rotate(${angle},${x},${y})` : '')
