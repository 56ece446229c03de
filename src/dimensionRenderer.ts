import { ARROWS, connectionPoint, hasExtensionLine, isAcadArrow, renderArrow } from './arrows'
import type { BlockLayout, GraphicAttribs } from './BlockLayout'
import type { Dimension } from './Dimension'
import { DEFAULT_TEXT_STYLE, type DimStyle } from './DimStyle'
import { DimStyleOverride, type OverrideMap } from './DimStyleOverride'
import type { DimStyleValue } from './dimstyleSchema'
import { NotFoundError, UnsupportedDimensionTypeError, ValidationError } from './errors'
import { formatText } from './formatText'
import {
  PassThroughUCS,
  Z_AXIS,
  add,
  fromDegAngle,
  intersectRays,
  isClose,
  lerp,
  magnitude,
  normalize,
  orthogonal,
  ray2D,
  scale,
  subtract,
  type UCS,
  type Vec3,
} from './vector'

const { PI } = Math

export interface RenderOptions {
  /** coordinate system of the definition points, WCS if unset */
  readonly ucs?: UCS
  /** replaces the DIMSTYLE overrides stored in the DIMENSION */
  readonly override?: OverrideMap
  /** text style if the DIMSTYLE has none */
  readonly textStyle?: string
}

type Attribs = Partial<GraphicAttribs>
type ArrowNames = readonly [string, string]

const decimalSeparator = (value: DimStyleValue | undefined) => {
  if (typeof value === 'number') {
    return value > 0 ? String.fromCharCode(value) : '.'
  }
  return value || '.'
}

export class DimensionBase {
  protected readonly dimStyle: DimStyleOverride
  protected readonly textStyle: string
  protected readonly ucs: UCS
  protected readonly requiresExtrusion: boolean

  constructor(protected readonly dimension: Dimension, dimStyle: DimStyle, protected readonly block: BlockLayout, options: RenderOptions = {}) {
    this.dimStyle = new DimStyleOverride(dimStyle, options.override ?? dimension.override)
    this.textStyle = this.dimStyle.string('dimtxsty', options.textStyle ?? DEFAULT_TEXT_STYLE)
    this.ucs = options.ucs ?? new PassThroughUCS()
    this.requiresExtrusion = !isClose(this.ucs.uz, Z_AXIS)
    if (this.requiresExtrusion) {
      dimension.dxf.extrusion = this.ucs.uz
    }
    this.dimStyle.setAcadDstyle(dimension)
  }

  get textHeight() {
    return this.dimStyle.number('dimtxt', 1)
  }

  get suppressExtensionLine1() {
    return this.dimStyle.number('dimse1', 0) !== 0
  }

  get suppressExtensionLine2() {
    return this.dimStyle.number('dimse2', 0) !== 0
  }

  protected defaultAttributes(): Attribs {
    const { layer, color } = this.dimension.dxf
    return { layer, color }
  }

  // entities placed in OCS
  protected ocsAttributes(attribs: Attribs): Attribs {
    return { ...this.defaultAttributes(), ...(this.requiresExtrusion ? { extrusion: this.ucs.uz } : undefined), ...attribs }
  }

  protected wcs(point: Vec3) {
    return this.ucs.toWcs(point)
  }

  protected ocs(point: Vec3) {
    return this.ucs.toOcs(point)
  }

  protected getText(measurement: number) {
    const text = this.dimension.dxf.text
    if (text === ' ') {
      return ''
    }
    return text === '' || text === '<>' ? this.formatText(measurement) : text
  }

  /** Arrow names of start and end, `undefined` if ticks replace arrows. */
  protected getArrowNames(): ArrowNames | undefined {
    if (this.dimStyle.number('dimtsz', 0) > 0) {
      return
    }
    if (this.dimStyle.number('dimsah', 0)) {
      return [this.dimStyle.string('dimblk1', ARROWS.closedFilled), this.dimStyle.string('dimblk2', ARROWS.closedFilled)]
    }
    const blk = this.dimStyle.string('dimblk', ARROWS.closedFilled)
    return [blk, blk]
  }

  protected formatText(value: number) {
    const dimdec = this.dimStyle.get('dimdec')
    return formatText(value, {
      dimrnd: this.dimStyle.number('dimrnd', 0),
      dimdec: dimdec === undefined ? undefined : Number(dimdec),
      dimzin: this.dimStyle.number('dimzin', 0),
      dimdsep: decimalSeparator(this.dimStyle.get('dimdsep', '.')),
      dimpost: this.dimStyle.string('dimpost', '<>'),
    })
  }

  protected addLine(start: Vec3, end: Vec3, attribs: Attribs = {}) {
    this.block.addLine(this.wcs(start), this.wcs(end), { ...this.defaultAttributes(), ...attribs })
  }

  /** Places an arrow block and returns the point where the dimension line connects. */
  protected addBlockRef(name: string, insert: Vec3, rotation: number, size: number, reverse: boolean, attribs: Attribs = {}): Vec3 {
    const blocks = this.dimension.doc.blocks
    const acadArrow = isAcadArrow(name)
    if (!acadArrow && !blocks.has(name)) {
      throw new NotFoundError(`Undefined block: "${name}"`)
    }
    const blockName = acadArrow ? blocks.createArrowBlock(name) : name
    if (reverse) {
      rotation += 180
    }
    this.block.addBlockRef(
      blockName,
      this.ocs(insert),
      { rotation: this.ucs.toOcsAngleDeg(rotation), xscale: size, yscale: size },
      this.ocsAttributes(attribs),
    )
    return acadArrow ? connectionPoint(name, insert, size, rotation) : insert
  }

  protected addTick(insert: Vec3, rotation: number, size: number, attribs: Attribs) {
    renderArrow(this.block, ARROWS.oblique, insert, size, rotation, { ...this.defaultAttributes(), ...attribs }, point => this.wcs(point))
  }

  protected addText(text: string, position: Vec3, rotation: number, attribs: Attribs = {}) {
    this.block.addText(
      text,
      { insert: this.ocs(position), height: this.textHeight, rotation: this.ucs.toOcsAngleDeg(rotation), style: this.textStyle, align: 'MIDDLE_CENTER' },
      this.ocsAttributes(attribs),
    )
  }

  /** POINT entities at the definition points, on layer DEFPOINTS. */
  protected addDefpoints(points: readonly Vec3[]) {
    for (const point of points) {
      this.block.addPoint(this.wcs(point), { layer: 'DEFPOINTS' })
    }
  }
}

/** Horizontal, vertical and rotated linear dimensions. */
export class LinearDimension extends DimensionBase {
  render() {
    const dim = this.dimension.dxf
    const angle = (dim.angle * PI) / 180
    const extAngle = angle + PI / 2
    const dimlineRay = ray2D(dim.defpoint, angle)
    let dimlineStart = intersectRays(dimlineRay, ray2D(dim.defpoint2, extAngle))
    let dimlineEnd = intersectRays(dimlineRay, ray2D(dim.defpoint3, extAngle))
    dim.defpoint = dimlineStart
    const measurement = magnitude(subtract(dimlineStart, dimlineEnd))
    const text = this.getText(measurement * this.dimStyle.number('dimlfac', 1))

    if (text) {
      let position = dim.textMidpoint
      if (!position) {
        position = this.getTextMidpoint(dimlineStart, dimlineEnd)
        dim.textMidpoint = position
      }
      this.addMeasurementText(text, position)
    }

    this.suppressExtensionLine1 || this.addExtensionLine(dim.defpoint2, dimlineStart)
    this.suppressExtensionLine2 || this.addExtensionLine(dim.defpoint3, dimlineEnd)

    const arrows = this.getArrowNames()
    ;[dimlineStart, dimlineEnd] = this.addArrows(dimlineStart, dimlineEnd, arrows)
    this.addDimensionLine(dimlineStart, dimlineEnd, arrows)

    this.addDefpoints([dim.defpoint, dim.defpoint2, dim.defpoint3])
    this.defpointsToWcs()
  }

  // text midpoint is stored in OCS
  private defpointsToWcs() {
    const dim = this.dimension.dxf
    dim.defpoint = this.wcs(dim.defpoint)
    dim.defpoint2 = this.wcs(dim.defpoint2)
    dim.defpoint3 = this.wcs(dim.defpoint3)
    if (dim.textMidpoint) {
      dim.textMidpoint = this.ocs(dim.textMidpoint)
    }
  }

  private addMeasurementText(text: string, position: Vec3) {
    const { angle, textRotation, color } = this.dimension.dxf
    this.addText(text, position, angle + textRotation, { color: this.dimStyle.number('dimclrt', color) })
  }

  private addDimensionLine(start: Vec3, end: Vec3, arrows: ArrowNames | undefined) {
    const extension = normalize(subtract(end, start), this.dimStyle.number('dimdle', 0))
    if (!arrows || hasExtensionLine(arrows[0])) {
      start = subtract(start, extension)
    }
    if (!arrows || hasExtensionLine(arrows[1])) {
      end = add(end, extension)
    }
    this.addLine(start, end, { color: this.dimStyle.number('dimclrd', this.dimension.dxf.color) })
  }

  private addExtensionLine(start: Vec3, end: Vec3) {
    const length = magnitude(subtract(end, start))
    // measurement point on the dimension line
    const direction = length > 0 ? scale(subtract(end, start), 1 / length) : fromDegAngle(this.dimension.dxf.angle + 90)
    start = add(start, scale(direction, this.dimStyle.number('dimexo', 0)))
    end = add(end, scale(direction, this.dimStyle.number('dimexe', 0)))
    this.addLine(start, end, { color: this.dimStyle.number('dimclre', this.dimension.dxf.color) })
  }

  private addArrows(start: Vec3, end: Vec3, arrows: ArrowNames | undefined): [Vec3, Vec3] {
    const { angle, color } = this.dimension.dxf
    const attribs = { color: this.dimStyle.number('dimclrd', color) }
    if (!arrows) {
      // ticks are drawn twice as large as dimtsz
      const size = this.dimStyle.number('dimtsz', 0) * 2
      this.addTick(start, angle, size, attribs)
      this.addTick(end, angle, size, attribs)
      return [start, end]
    }
    const size = this.dimStyle.number('dimasz', 2.5)
    return [this.addBlockRef(arrows[0], start, angle, size, true, attribs), this.addBlockRef(arrows[1], end, angle, size, false, attribs)]
  }

  private getTextMidpoint(start: Vec3, end: Vec3) {
    const tad = this.dimStyle.number('dimtad', 1)
    let distance = this.textHeight / 2 + this.dimStyle.number('dimgap', 0.625)
    if (tad === 0) {
      distance = 0
    } else if (tad === 4) {
      distance = -distance
    }
    return add(lerp(start, end), normalize(orthogonal(subtract(end, start)), distance))
  }
}

/** Values of the DIMENSION type field without its flag bits. */
export const DIMENSION_TYPES = {
  linear: 0,
  aligned: 1,
  angular: 2,
  diameter: 3,
  radius: 4,
  angular3p: 5,
  ordinate: 6,
} as const

type Renderer = (dimension: Dimension, dimStyle: DimStyle, block: BlockLayout, options: RenderOptions) => void

const linear: Renderer = (dimension, dimStyle, block, options) => new LinearDimension(dimension, dimStyle, block, options).render()

const notImplemented = (kind: string): Renderer => () => {
  throw new UnsupportedDimensionTypeError(`Rendering of ${kind} dimensions is not implemented.`)
}

const RENDERERS = new Map<number, Renderer>([
  [DIMENSION_TYPES.linear, linear],
  [DIMENSION_TYPES.aligned, linear],
  [DIMENSION_TYPES.angular, notImplemented('angular')],
  [DIMENSION_TYPES.diameter, notImplemented('diameter')],
  [DIMENSION_TYPES.radius, notImplemented('radius')],
  [DIMENSION_TYPES.angular3p, notImplemented('3-point angular')],
  [DIMENSION_TYPES.ordinate, notImplemented('ordinate')],
])

export const DimensionRenderer = {
  /**
   * Renders `dimension` into a new anonymous block and stores the block name as its geometry.
   * A failed render removes the block again and restores the previous DIMENSION attributes.
   */
  dispatch(dimension: Dimension, options: RenderOptions = {}) {
    const render = RENDERERS.get(dimension.dimType)
    if (!render) {
      throw new ValidationError(`Unknown DIMENSION type: ${dimension.dimType}`)
    }
    const dimStyle = dimension.dimStyle()
    const { blocks } = dimension.doc
    const previous = { ...dimension.dxf }
    const block = blocks.newAnonymousBlock('D')
    dimension.dxf.geometry = block.name
    try {
      render(dimension, dimStyle, block, options)
    } catch (error) {
      blocks.delete(block.name)
      Object.assign(dimension.dxf, previous)
      throw error
    }
    return block
  },
}
