import { describe, expect, it } from 'vitest'
import { DIMSTYLE_SCHEMA, DXF12, DXF2000, DXF2004, DXF2007, DXF2018, parseDimStyleSchema, parseDimStyleValue } from './dimstyleSchema'
import { SchemaError } from './errors'

const names = (version: string) => DIMSTYLE_SCHEMA.exportFields(version).map(field => field.name)

describe('DIMSTYLE_SCHEMA', () => {
  it('describes attributes by name', () => {
    const field = DIMSTYLE_SCHEMA.get('dimasz')
    expect(field.code).toBe(41)
    expect(field.defaultValue).toBe(2.5)
    expect(field.kind).toBe('plain')
    expect(DIMSTYLE_SCHEMA.get('dimblk').kind).toBe('callback')
  })

  it('rejects unknown attributes', () => {
    expect(() => DIMSTYLE_SCHEMA.get('dimfoo')).toThrow(new SchemaError('Invalid DXF attribute "dimfoo" for DIMSTYLE.'))
  })

  it('gates attributes by DXF version', () => {
    expect(DIMSTYLE_SCHEMA.supports('dimblk', DXF12)).toBe(true)
    expect(DIMSTYLE_SCHEMA.supports('dimtxsty_handle', DXF12)).toBe(false)
    expect(DIMSTYLE_SCHEMA.supports('dimtxsty_handle', DXF2000)).toBe(true)
    expect(DIMSTYLE_SCHEMA.supports('dimfxl', DXF2004)).toBe(false)
    expect(DIMSTYLE_SCHEMA.supports('dimfxl', DXF2007)).toBe(true)
    expect(DIMSTYLE_SCHEMA.supports('dimfoo', DXF2018)).toBe(false)
  })

  it('finds DIMxxx attributes by group code', () => {
    expect(DIMSTYLE_SCHEMA.fieldByCode(41)?.name).toBe('dimasz')
    expect(DIMSTYLE_SCHEMA.fieldByCode(70)?.name).toBe('dimtfillclr')
    expect(DIMSTYLE_SCHEMA.fieldByCode(342)?.name).toBe('dimblk_handle')
    expect(DIMSTYLE_SCHEMA.fieldByCode(-666)).toBeUndefined()
  })

  it('exports arrow names for R12 and block record handles for later versions', () => {
    expect(names(DXF12)).toHaveLength(41)
    expect(names(DXF12).slice(0, 8)).toEqual(['name', 'flags', 'dimpost', 'dimapost', 'dimblk', 'dimblk1', 'dimblk2', 'dimscale'])
    expect(names(DXF12)).not.toContain('dimblk_handle')
    expect(names(DXF2000)).toHaveLength(66)
    expect(names(DXF2004)).toEqual(names(DXF2000))
    expect(names(DXF2000)).toContain('dimblk_handle')
    expect(names(DXF2000)).not.toContain('dimblk')
    expect(names(DXF2007)).toHaveLength(71)
    expect(names(DXF2007).slice(-5)).toEqual(['dimltype_handle', 'dimltex1_handle', 'dimltex2_handle', 'dimlwd', 'dimlwe'])
  })
})

describe('parseDimStyleSchema', () => {
  it('rejects malformed data', () => {
    expect(() => parseDimStyleSchema({})).toThrow(SchemaError)
    expect(() => parseDimStyleSchema({ fields: [{ name: 'dimasz' }], exportLists: { R12: [], R2000: [], R2007: [] } })).toThrow(
      'DIMSTYLE field #0 is malformed.',
    )
  })

  it('rejects duplicate names and unknown export names', () => {
    const field = { name: 'dimasz', code: 41, type: 'float' }
    expect(() => parseDimStyleSchema({ fields: [field, field], exportLists: { R12: [], R2000: [], R2007: [] } })).toThrow(
      'Duplicate DIMSTYLE attribute "dimasz".',
    )
    expect(() => parseDimStyleSchema({ fields: [field], exportLists: { R12: ['dimexo'], R2000: [], R2007: [] } })).toThrow(SchemaError)
  })
})

describe('parseDimStyleValue', () => {
  it('converts tag values by attribute type', () => {
    expect(parseDimStyleValue(DIMSTYLE_SCHEMA.get('dimtad'), '  4')).toBe(4)
    expect(parseDimStyleValue(DIMSTYLE_SCHEMA.get('dimasz'), '0.18')).toBe(0.18)
    expect(parseDimStyleValue(DIMSTYLE_SCHEMA.get('dimblk_handle'), ' 1F ')).toBe('1F')
    expect(parseDimStyleValue(DIMSTYLE_SCHEMA.get('dimpost'), ' <>')).toBe(' <>')
  })
})
