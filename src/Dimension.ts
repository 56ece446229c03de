import { getGroupCodeValue as $, type DxfRecordReadonly } from '@dxfom/dxf'
import type { DxfPrimitive } from './BlockLayout'
import { DimensionRenderer, type RenderOptions } from './dimensionRenderer'
import type { Document } from './Document'
import type { OverrideMap } from './DimStyleOverride'
import { DIMSTYLE_SCHEMA } from './dimstyleSchema'
import { decodeDimStyleOverrides, encodeDimStyleOverrides, type XDataTag } from './dstyle'
import { $number, $point, $trim } from './util'
import type { Vec3 } from './vector'

export interface DimensionAttribs {
  /** start of the dimension line, WCS */
  defpoint: Vec3
  /** measurement points, WCS */
  defpoint2: Vec3
  defpoint3: Vec3
  /** OCS */
  textMidpoint?: Vec3
  /** direction of the dimension line in degrees */
  angle: number
  textRotation: number
  dimtype: number
  dimstyle: string
  /** `''` or `'<>'` = measurement, `' '` = no text */
  text: string
  /** name of the anonymous block which contains the rendered geometry */
  geometry?: string
  layer: string
  color: number
  extrusion?: Vec3
}

export class Dimension {
  readonly dxftype = 'DIMENSION'
  readonly dxf: DimensionAttribs
  private _override: OverrideMap

  constructor(readonly doc: Document, readonly handle: string, attribs: Partial<DimensionAttribs> = {}, override: OverrideMap = {}) {
    this.dxf = {
      defpoint: attribs.defpoint ?? [0, 0, 0],
      defpoint2: attribs.defpoint2 ?? [0, 0, 0],
      defpoint3: attribs.defpoint3 ?? [0, 0, 0],
      textMidpoint: attribs.textMidpoint,
      angle: attribs.angle ?? 0,
      textRotation: attribs.textRotation ?? 0,
      dimtype: attribs.dimtype ?? 0,
      dimstyle: attribs.dimstyle ?? 'Standard',
      text: attribs.text ?? '',
      geometry: attribs.geometry,
      layer: attribs.layer ?? '0',
      color: attribs.color ?? 256,
      extrusion: attribs.extrusion,
    }
    this._override = override
  }

  static fromRecord(doc: Document, record: DxfRecordReadonly) {
    return new Dimension(
      doc,
      $trim(record, 5) ?? doc.db.nextHandle(),
      {
        defpoint: $point(record, 10),
        defpoint2: $point(record, 13),
        defpoint3: $point(record, 14),
        textMidpoint: $point(record, 11),
        angle: $number(record, 50, 0),
        textRotation: $number(record, 53, 0),
        dimtype: $number(record, 70, 0),
        dimstyle: $trim(record, 3),
        text: $(record, 1),
        geometry: $trim(record, 2),
        layer: $trim(record, 8),
        color: $number(record, 62, 256),
        extrusion: $point(record, 210),
      },
      decodeDimStyleOverrides(doc, record),
    )
  }

  get override() {
    return this._override
  }

  /** Dimension type without the flag bits. */
  get dimType() {
    return this.dxf.dimtype & 7
  }

  dimStyle() {
    return this.doc.dimstyles.get(this.dxf.dimstyle)
  }

  /** Stores DIMSTYLE overrides, the values are written into the `ACAD` XDATA. */
  setAcadDstyle(override: OverrideMap) {
    for (const name of Object.keys(override)) {
      DIMSTYLE_SCHEMA.get(name)
    }
    this._override = { ...override }
  }

  xdata(): XDataTag[] {
    return Object.keys(this._override).length === 0 ? [] : encodeDimStyleOverrides(this.doc, this._override)
  }

  /** Creates the geometry block and returns its name. */
  render(options: RenderOptions = {}) {
    return DimensionRenderer.dispatch(this, options).name
  }

  /** Content of the geometry block, rendered on demand. */
  *virtualEntities(): Generator<DxfPrimitive> {
    let name = this.dxf.geometry
    if (name === undefined || !this.doc.blocks.has(name)) {
      name = this.render()
    }
    for (const entity of this.doc.blocks.get(name).entities) {
      yield { ...entity, transparency: 0 }
    }
  }
}
