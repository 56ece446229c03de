import { describe, expect, it } from 'vitest'
import { DimStyleOverride } from './DimStyleOverride'
import { DXF12 } from './dimstyleSchema'
import { Document } from './Document'
import { SchemaError } from './errors'

describe('DimStyleOverride', () => {
  it('prefers override values', () => {
    const doc = new Document({ warn: () => {} })
    const dimStyle = new DimStyleOverride(doc.dimstyles.get('Standard'), { dimasz: 5, dimpost: '<> mm' })
    expect(dimStyle.get('dimasz')).toBe(5)
    expect(dimStyle.number('dimexo', 0)).toBe(0.625)
    expect(dimStyle.string('dimpost', '<>')).toBe('<> mm')
    expect(dimStyle.string('dimtxsty', 'Other')).toBe('Standard')
  })

  it('keeps resolved values after the base style changes', () => {
    const doc = new Document({ warn: () => {} })
    const base = doc.dimstyles.get('Standard')
    const dimStyle = new DimStyleOverride(base, { dimtsz: 1 })
    expect(dimStyle.get('dimasz')).toBe(2.5)
    base.setDxfAttrib('dimasz', 4)
    expect(base.getDxfAttrib('dimasz')).toBe(4)
    expect(dimStyle.get('dimasz')).toBe(2.5)
    expect(dimStyle.get('dimtsz')).toBe(1)
  })

  it('rejects unknown attributes', () => {
    const doc = new Document({ warn: () => {} })
    const dimStyle = new DimStyleOverride(doc.dimstyles.get('Standard'), { dimfoo: 1 })
    expect(() => dimStyle.get('dimfoo')).toThrow(SchemaError)
  })

  it('falls back to defaults for attributes of later DXF versions', () => {
    const doc = new Document({ version: DXF12, warn: () => {} })
    const dimStyle = new DimStyleOverride(doc.dimstyles.get('Standard'))
    expect(dimStyle.get('dimdec', 2)).toBe(2)
    expect(dimStyle.get('dimdec', 4)).toBe(2)
    expect(dimStyle.number('dimfxl', 1.5)).toBe(1.5)
  })

  it('returns the default for non-numeric values', () => {
    const doc = new Document({ warn: () => {} })
    const dimStyle = new DimStyleOverride(doc.dimstyles.get('Standard'), { dimgap: 'wide' })
    expect(dimStyle.number('dimgap', 0.625)).toBe(0.625)
  })

  it('stores the override in a DIMENSION', () => {
    const doc = new Document({ warn: () => {} })
    const dimension = doc.addLinearDim({ base: [0, 5, 0], p1: [0, 0, 0], p2: [10, 0, 0] })
    new DimStyleOverride(doc.dimstyles.get('Standard'), { dimtsz: 1 }).setAcadDstyle(dimension)
    expect(dimension.override).toEqual({ dimtsz: 1 })
  })
})
