import type { BlockLayout, BlockTable, GraphicAttribs } from './BlockLayout'
import { add, fromDegAngle, subtract, type Vec3 } from './vector'

const { PI, cos, sin, tan } = Math

export const ARROWS = {
  closedFilled: '',
  dot: 'DOT',
  dotSmall: 'DOTSMALL',
  dotBlank: 'DOTBLANK',
  originIndicator: 'ORIGIN',
  originIndicator2: 'ORIGIN2',
  open: 'OPEN',
  rightAngle: 'OPEN90',
  open30: 'OPEN30',
  closed: 'CLOSED',
  dotSmallBlank: 'SMALL',
  none: 'NONE',
  oblique: 'OBLIQUE',
  boxFilled: 'BOXFILLED',
  box: 'BOXBLANK',
  closedBlank: 'CLOSEDBLANK',
  datumTriangleFilled: 'DATUMFILLED',
  datumTriangle: 'DATUMBLANK',
  integral: 'INTEGRAL',
  architecturalTick: 'ARCHTICK',
} as const

export type ArrowName = (typeof ARROWS)[keyof typeof ARROWS]

const ACAD_ARROWS: ReadonlySet<string> = new Set(Object.values(ARROWS))
// the dimension line ends at the insertion point of these arrows
const ORIGIN_ZERO: ReadonlySet<string> = new Set([ARROWS.architecturalTick, ARROWS.oblique, ARROWS.dotSmall, ARROWS.dotSmallBlank, ARROWS.integral, ARROWS.none])
const EXTENSION_LINE: ReadonlySet<string> = new Set([ARROWS.architecturalTick, ARROWS.oblique])

export const isAcadArrow = (name: string) => ACAD_ARROWS.has(name.toUpperCase())
export const hasExtensionLine = (name: string) => EXTENSION_LINE.has(name.toUpperCase())

/** Name of the BLOCK definition which draws the arrow `name`, names of user blocks are returned unchanged. */
export const arrowBlockName = (name: string) => {
  if (!isAcadArrow(name)) {
    return name
  }
  return name === ARROWS.closedFilled ? '_CLOSEDFILLED' : '_' + name.toUpperCase()
}

/** Standard arrow name of an arrow BLOCK definition, other block names are returned unchanged. */
export const arrowName = (blockName: string) => {
  if (blockName.startsWith('_')) {
    const name = blockName.slice(1).toUpperCase()
    if (name === 'CLOSEDFILLED') {
      return ARROWS.closedFilled
    }
    if (isAcadArrow(name)) {
      return name
    }
  }
  return blockName
}

/** Start of the dimension line for an arrow at `insert`. */
export const connectionPoint = (name: string, insert: Vec3, size: number, rotation: number): Vec3 =>
  ORIGIN_ZERO.has(name.toUpperCase()) ? insert : subtract(insert, fromDegAngle(rotation, size))

type Point2 = readonly [number, number]

export interface ArrowShape {
  readonly lines: readonly (readonly Point2[])[]
  readonly solids: readonly (readonly Point2[])[]
}

const circle = (cx: number, cy: number, r: number, segments = 16): Point2[] => {
  const points: Point2[] = []
  for (let i = 0; i <= segments; i++) {
    const angle = (2 * PI * i) / segments
    points.push([cx + r * cos(angle), cy + r * sin(angle)])
  }
  return points
}

const h30 = tan(PI / 12)

// unit size, tip at the origin, pointing in +x direction
const ARROW_SHAPES: Record<ArrowName, ArrowShape> = {
  [ARROWS.closedFilled]: { lines: [], solids: [[[0, 0], [-1, 1 / 6], [-1, -1 / 6]]] },
  [ARROWS.closedBlank]: { lines: [[[0, 0], [-1, 1 / 6], [-1, -1 / 6], [0, 0]]], solids: [] },
  [ARROWS.closed]: { lines: [[[0, 0], [-1, 1 / 6], [-1, -1 / 6], [0, 0]], [[-1, 0], [0, 0]]], solids: [] },
  [ARROWS.open]: { lines: [[[-1, 1 / 6], [0, 0], [-1, -1 / 6]]], solids: [] },
  [ARROWS.open30]: { lines: [[[-1, h30], [0, 0], [-1, -h30]]], solids: [] },
  [ARROWS.rightAngle]: { lines: [[[-0.5, 0.5], [0, 0], [-0.5, -0.5]]], solids: [] },
  [ARROWS.oblique]: { lines: [[[-0.5, -0.5], [0.5, 0.5]]], solids: [] },
  [ARROWS.architecturalTick]: { lines: [], solids: [[[-0.55, -0.45], [0.45, 0.55], [0.55, 0.45], [-0.45, -0.55]]] },
  [ARROWS.dot]: { lines: [], solids: [circle(-0.5, 0, 0.5)] },
  [ARROWS.dotSmall]: { lines: [], solids: [circle(0, 0, 0.25)] },
  [ARROWS.dotBlank]: { lines: [circle(-0.5, 0, 0.5)], solids: [] },
  [ARROWS.dotSmallBlank]: { lines: [circle(0, 0, 0.25)], solids: [] },
  [ARROWS.originIndicator]: { lines: [circle(0, 0, 0.5)], solids: [] },
  [ARROWS.originIndicator2]: { lines: [circle(0, 0, 0.5), circle(0, 0, 0.25)], solids: [] },
  [ARROWS.boxFilled]: { lines: [], solids: [[[-1, -0.5], [0, -0.5], [0, 0.5], [-1, 0.5]]] },
  [ARROWS.box]: { lines: [[[-1, -0.5], [0, -0.5], [0, 0.5], [-1, 0.5], [-1, -0.5]]], solids: [] },
  [ARROWS.datumTriangleFilled]: { lines: [], solids: [[[0, 0.5], [0, -0.5], [-1, 0]]] },
  [ARROWS.datumTriangle]: { lines: [[[0, 0.5], [0, -0.5], [-1, 0], [0, 0.5]]], solids: [] },
  [ARROWS.integral]: { lines: [[[-0.4, -0.45], [-0.15, -0.35], [0, 0], [0.15, 0.35], [0.4, 0.45]]], solids: [] },
  [ARROWS.none]: { lines: [], solids: [] },
}

const isArrowName = (name: string): name is ArrowName => ACAD_ARROWS.has(name)

export const arrowShape = (name: string): ArrowShape | undefined => {
  const upper = name.toUpperCase()
  return isArrowName(upper) ? ARROW_SHAPES[upper] : undefined
}

/** Places the shape of arrow `name` as LINE and SOLID primitives. */
export const renderArrow = (
  layout: Pick<BlockLayout, 'addLine' | 'addSolid'>,
  name: string,
  insert: Vec3,
  size: number,
  rotation: number,
  attribs: Partial<GraphicAttribs> = {},
  toWcs: (point: Vec3) => Vec3 = point => point,
) => {
  const shape = arrowShape(name)
  if (!shape) {
    return
  }
  const angle = (rotation * PI) / 180
  const transform = ([x, y]: Point2): Vec3 =>
    toWcs(add(insert, [(x * cos(angle) - y * sin(angle)) * size, (x * sin(angle) + y * cos(angle)) * size, 0]))
  for (const line of shape.lines) {
    for (let i = 1; i < line.length; i++) {
      layout.addLine(transform(line[i - 1]), transform(line[i]), attribs)
    }
  }
  for (const solid of shape.solids) {
    layout.addSolid(solid.map(transform), attribs)
  }
}

/** Creates the BLOCK definition of a standard arrow on first use, returns the block name. */
export const createArrowBlock = (blocks: BlockTable, name: string) => {
  const blockName = arrowBlockName(name)
  if (!blocks.has(blockName)) {
    const block = blocks.new(blockName)
    renderArrow(block, name, [0, 0, 0], 1, 0, { color: 0 })
  }
  return blockName
}
