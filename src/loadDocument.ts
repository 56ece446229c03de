import { getGroupCodeValue as $, getGroupCodeValues as $$, type DxfReadonly, type DxfRecordReadonly } from '@dxfom/dxf'
import type { DxfPrimitive, GraphicAttribs } from './BlockLayout'
import { Dimension } from './Dimension'
import { DimStyle } from './DimStyle'
import { Document } from './Document'
import { DXF12 } from './dimstyleSchema'
import { $number, $point, $trim, type Warn } from './util'
import type { Vec3 } from './vector'

export interface LoadDocumentOptions {
  readonly warn: Warn
}

const defaultOptions: LoadDocumentOptions = {
  warn: console.debug,
}

const ORIGIN: Vec3 = [0, 0, 0]

const graphicAttribs = (entity: DxfRecordReadonly): GraphicAttribs => ({
  layer: $trim(entity, 8) ?? '0',
  color: $number(entity, 62, 256),
  extrusion: $point(entity, 210),
})

/** LINE, POINT, SOLID, TEXT and INSERT records, `undefined` for other entity types. */
export const parsePrimitive = (entity: DxfRecordReadonly): DxfPrimitive | undefined => {
  switch ($trim(entity, 0)) {
    case 'LINE':
      return { ...graphicAttribs(entity), dxftype: 'LINE', start: $point(entity, 10) ?? ORIGIN, end: $point(entity, 11) ?? ORIGIN }
    case 'POINT':
      return { ...graphicAttribs(entity), dxftype: 'POINT', location: $point(entity, 10) ?? ORIGIN }
    case 'SOLID': {
      const [p1, p2, p3, p4] = [10, 11, 12, 13].map(groupCode => $point(entity, groupCode) ?? ORIGIN)
      // vertices 3 and 4 are stored in zigzag order
      const points = p3[0] === p4[0] && p3[1] === p4[1] ? [p1, p2, p3] : [p1, p2, p4, p3]
      return { ...graphicAttribs(entity), dxftype: 'SOLID', points }
    }
    case 'TEXT': {
      const align = $number(entity, 72, 0) === 1 && $number(entity, 73, 0) === 2 ? 'MIDDLE_CENTER' : 'LEFT'
      const insert = (align === 'MIDDLE_CENTER' ? $point(entity, 11) : undefined) ?? $point(entity, 10) ?? ORIGIN
      return {
        ...graphicAttribs(entity),
        dxftype: 'TEXT',
        text: $(entity, 1) ?? '',
        insert,
        height: $number(entity, 40, 2.5),
        rotation: $number(entity, 50, 0),
        style: $trim(entity, 7) ?? 'Standard',
        align,
      }
    }
    case 'INSERT':
      return {
        ...graphicAttribs(entity),
        dxftype: 'INSERT',
        name: $trim(entity, 2) ?? '',
        insert: $point(entity, 10) ?? ORIGIN,
        rotation: $number(entity, 50, 0),
        xscale: $number(entity, 41, 1),
        yscale: $number(entity, 42, 1),
      }
  }
}

const blockContent = (records: readonly DxfRecordReadonly[]) =>
  records.slice($(records[0], 0) === 'BLOCK' ? 1 : 0, $(records[records.length - 1], 0) === 'ENDBLK' ? -1 : undefined)

/** Document of a parsed DXF file, entity types other than DIMENSION and the primitives are skipped. */
export const loadDocument = (dxf: DxfReadonly, options?: Partial<LoadDocumentOptions>) => {
  const { warn } = options ? { ...defaultOptions, ...options } : defaultOptions
  const version = $trim(dxf.HEADER?.$ACADVER, 1) ?? DXF12
  const doc = new Document({ version, warn, setup: false })
  const luprec = $number(dxf.HEADER?.$LUPREC, 70)
  isNaN(luprec) || doc.header.set('$LUPREC', luprec)

  for (const ltype of dxf.TABLES?.LTYPE ?? []) {
    const name = $trim(ltype, 2)
    if ($trim(ltype, 0) !== 'LTYPE' || !name || doc.linetypes.has(name)) {
      continue
    }
    doc.linetypes.add({
      dxftype: 'LTYPE',
      handle: $trim(ltype, 5) ?? doc.db.nextHandle(),
      name,
      description: $(ltype, 3) ?? '',
      pattern: $$(ltype, 49).map(Number),
    })
  }

  for (const style of dxf.TABLES?.STYLE ?? []) {
    const name = $trim(style, 2)
    if ($trim(style, 0) !== 'STYLE' || !name || doc.styles.has(name)) {
      continue
    }
    doc.styles.add({ dxftype: 'STYLE', handle: $trim(style, 5) ?? doc.db.nextHandle(), name, font: $trim(style, 3) ?? 'txt', height: $number(style, 40, 0) })
  }

  const blockRecordHandles = new Map<string, string>()
  for (const record of dxf.TABLES?.BLOCK_RECORD ?? []) {
    const name = $trim(record, 2)
    const handle = $trim(record, 5)
    name && handle && blockRecordHandles.set(name.toLowerCase(), handle)
  }

  for (const [name, records] of Object.entries(dxf.BLOCKS ?? {})) {
    if (doc.blocks.has(name)) {
      warn(`Duplicate BLOCK "${name}".`)
      continue
    }
    const block = doc.blocks.new(name, $point(records[0], 10), blockRecordHandles.get(name.toLowerCase()))
    for (const entity of blockContent(records)) {
      const primitive = parsePrimitive(entity)
      primitive ? block.add(primitive) : warn(`Unsupported entity type in BLOCK "${name}": ${$(entity, 0)}`)
    }
  }

  for (const record of dxf.TABLES?.DIMSTYLE ?? []) {
    if ($trim(record, 0) !== 'DIMSTYLE') {
      continue
    }
    const dimStyle = DimStyle.load(doc, $trim(record, 105) ?? doc.db.nextHandle(), record)
    if (doc.dimstyles.has(dimStyle.name)) {
      warn(`Duplicate DIMSTYLE "${dimStyle.name}".`)
      continue
    }
    doc.dimstyles.add(dimStyle)
  }

  doc.setupDefaults()

  for (const entity of dxf.ENTITIES ?? []) {
    const entityType = $trim(entity, 0)
    if (entityType === 'DIMENSION') {
      const dimension = Dimension.fromRecord(doc, entity)
      doc.db.add(dimension)
      doc.modelspace.push(dimension)
      continue
    }
    const primitive = parsePrimitive(entity)
    primitive ? doc.modelspace.push(primitive) : warn(`Unsupported entity type: ${entityType}`, entity)
  }
  return doc
}
