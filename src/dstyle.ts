import type { DxfRecordReadonly } from '@dxfom/dxf'
import { ARROWS, arrowName, isAcadArrow } from './arrows'
import type { DimStyleContext } from './DimStyle'
import type { OverrideMap } from './DimStyleOverride'
import type { NameResolver } from './Document'
import { DIMSTYLE_SCHEMA, VIRTUAL_TAG, parseDimStyleValue, type DimStyleSchema, type DimStyleValue, type StyleFieldType } from './dimstyleSchema'
import { NotFoundError } from './errors'

export type XDataTag = readonly [number, string]

const VALUE_CODES: Readonly<Record<StyleFieldType, number>> = { string: 1000, float: 1040, int: 1070, handle: 1005 }
const ARROW_ATTRIBS: ReadonlySet<string> = new Set(['dimblk', 'dimblk1', 'dimblk2', 'dimldrblk'])

/** Group code → raw value of the `DSTYLE` list in the XDATA of a DIMENSION. */
export const collectDimensionStyleOverrides = (d: DxfRecordReadonly) => {
  const result = new Map<number, string>()
  for (let i = 0; i < d.length - 1; i++) {
    if (d[i][0] === 1000 && d[i][1].trim() === 'DSTYLE' && d[i + 1][0] === 1002 && d[i + 1][1].trim() === '{') {
      for (let j = i + 2; j < d.length; j++) {
        if (d[j][0] === 1002) {
          break
        }
        if (d[j][0] === 1070 && j + 1 < d.length) {
          result.set(+d[j][1], d[++j][1])
        }
      }
      return result
    }
  }
}

const resolverOf = (doc: DimStyleContext, name: string): NameResolver =>
  ARROW_ATTRIBS.has(name) ? doc.blocks : name === 'dimtxsty' ? doc.styles : doc.linetypes

const encodeHandle = (doc: DimStyleContext, name: string, value: string) => {
  if (!ARROW_ATTRIBS.has(name)) {
    return resolverOf(doc, name).resolve(value)
  }
  if (value === ARROWS.closedFilled) {
    return '0'
  }
  return doc.blocks.resolve(isAcadArrow(value) ? doc.blocks.createArrowBlock(value) : value)
}

/** Override map of a DIMENSION record, handles are resolved to names. */
export const decodeDimStyleOverrides = (doc: DimStyleContext, record: DxfRecordReadonly, schema: DimStyleSchema = DIMSTYLE_SCHEMA) => {
  const override: Record<string, DimStyleValue> = {}
  for (const [groupCode, value] of collectDimensionStyleOverrides(record) ?? []) {
    const field = schema.fieldByCode(groupCode)
    if (!field) {
      doc.warn(`DSTYLE override: unknown DIMSTYLE group code ${groupCode}.`)
      continue
    }
    if (!field.name.endsWith('_handle')) {
      override[field.name] = parseDimStyleValue(field, value)
      continue
    }
    const name = field.name.slice(0, -'_handle'.length)
    const handle = value.trim()
    if (ARROW_ATTRIBS.has(name) && handle === '0') {
      override[name] = ARROWS.closedFilled
      continue
    }
    try {
      const resolved = resolverOf(doc, name).reverse(handle)
      override[name] = ARROW_ATTRIBS.has(name) ? arrowName(resolved) : resolved
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error
      }
      doc.warn(`DSTYLE override: invalid handle #${handle} of ${name}.`)
    }
  }
  return override
}

/** `ACAD` XDATA of an override map, names of blocks, linetypes and text styles are stored as handles. */
export const encodeDimStyleOverrides = (doc: DimStyleContext, override: OverrideMap, schema: DimStyleSchema = DIMSTYLE_SCHEMA) => {
  const tags: XDataTag[] = [[1001, 'ACAD'], [1000, 'DSTYLE'], [1002, '{']]
  for (const [name, value] of Object.entries(override)) {
    const field = schema.get(name)
    const handleField = `${name}_handle`
    if (field.kind === 'callback' && schema.supports(handleField, doc.version)) {
      tags.push([1070, String(schema.get(handleField).code)], [VALUE_CODES.handle, encodeHandle(doc, name, String(value))])
      continue
    }
    if (field.code === VIRTUAL_TAG || !schema.supports(name, doc.version)) {
      doc.warn(`DSTYLE override: "${name}" can not be stored in DXF ${doc.version}.`)
      continue
    }
    tags.push([1070, String(field.code)], [VALUE_CODES[field.type], String(value)])
  }
  tags.push([1002, '}'])
  return tags
}
