import type { DxfPrimitive, TextAlignment } from './BlockLayout'
import { Dimension } from './Dimension'
import type { Document, ModelspaceEntity } from './Document'
import type { Warn } from './util'
import { OCS, Z_AXIS, isEqual, type Vec3 } from './vector'

const { PI, atan2, cos, sin, hypot } = Math

/** Resolved graphic properties of a drawn entity. */
export interface Properties {
  /** ACI color, BYBLOCK is resolved by the block reference, 256 = BYLAYER */
  readonly color: number
  readonly layer: string
  readonly transparency: number
}

export interface TextProperties extends Properties {
  readonly height: number
  /** degrees, counter clockwise */
  readonly rotation: number
  readonly style: string
  readonly align: TextAlignment
}

/** Receives WCS geometry projected onto the xy-plane. */
export interface DrawingBackend {
  drawLine(start: Vec3, end: Vec3, properties: Properties): void
  drawFilledPolygon(points: readonly Vec3[], properties: Properties): void
  drawText(text: string, insert: Vec3, properties: TextProperties): void
  drawPoint(location: Vec3, properties: Properties): void
}

export interface DrawEntitiesOptions {
  readonly warn: Warn
}

// x' = a * x + c * y + e, y' = b * x + d * y + f
type Matrix = readonly [number, number, number, number, number, number]

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0]

const multiply = ([a1, b1, c1, d1, e1, f1]: Matrix, [a2, b2, c2, d2, e2, f2]: Matrix): Matrix => [
  a1 * a2 + c1 * b2,
  b1 * a2 + d1 * b2,
  a1 * c2 + c1 * d2,
  b1 * c2 + d1 * d2,
  a1 * e2 + c1 * f2 + e1,
  b1 * e2 + d1 * f2 + f1,
]

const transformPoint = ([a, b, c, d, e, f]: Matrix, [x, y]: Vec3): Vec3 => [a * x + c * y + e, b * x + d * y + f, 0]
const transformVector = ([a, b, c, d]: Matrix, [x, y]: Vec3): Vec3 => [a * x + c * y, b * x + d * y, 0]

const blockTransform = (insert: Vec3, rotation: number, xscale: number, yscale: number, [bx, by]: Vec3): Matrix => {
  const angle = (rotation * PI) / 180
  const c = cos(angle)
  const s = sin(angle)
  const [x, y] = insert
  return multiply([c * xscale, s * xscale, -s * yscale, c * yscale, x, y], [1, 0, 0, 1, -bx, -by])
}

const ocsToWcs = (point: Vec3, extrusion: Vec3 | undefined) => (extrusion && !isEqual(extrusion, Z_AXIS) ? new OCS(extrusion).toWcs(point) : point)

interface DrawContext {
  readonly matrix: Matrix
  /** color of the parent block reference or composite entity, replaces BYBLOCK */
  readonly blockColor: number
  readonly depth: number
}

const MAX_BLOCK_DEPTH = 16

/** Draws entities through `backend`, entities that fail are skipped. */
export const drawEntities = (doc: Document, entities: Iterable<ModelspaceEntity>, backend: DrawingBackend, options?: Partial<DrawEntitiesOptions>) => {
  const { warn } = { warn: doc.warn, ...options }

  const properties = (entity: DxfPrimitive, context: DrawContext): Properties => ({
    color: entity.color === 0 ? context.blockColor : entity.color,
    layer: entity.layer,
    transparency: entity.transparency ?? 0,
  })

  const drawPrimitive = (entity: DxfPrimitive, context: DrawContext) => {
    const { matrix } = context
    switch (entity.dxftype) {
      case 'LINE':
        backend.drawLine(transformPoint(matrix, entity.start), transformPoint(matrix, entity.end), properties(entity, context))
        break
      case 'SOLID':
        backend.drawFilledPolygon(
          entity.points.map(point => transformPoint(matrix, point)),
          properties(entity, context),
        )
        break
      case 'POINT':
        backend.drawPoint(transformPoint(matrix, entity.location), properties(entity, context))
        break
      case 'TEXT': {
        const angle = (entity.rotation * PI) / 180
        const [dx, dy] = transformVector(matrix, [cos(angle), sin(angle), 0])
        const [hx, hy] = transformVector(matrix, [-sin(angle) * entity.height, cos(angle) * entity.height, 0])
        backend.drawText(entity.text, transformPoint(matrix, ocsToWcs(entity.insert, entity.extrusion)), {
          ...properties(entity, context),
          height: hypot(hx, hy),
          rotation: (atan2(dy, dx) * 180) / PI,
          style: entity.style,
          align: entity.align,
        })
        break
      }
      case 'INSERT': {
        if (context.depth >= MAX_BLOCK_DEPTH) {
          warn(`Block nesting of "${entity.name}" is too deep.`)
          return
        }
        const block = doc.blocks.get(entity.name)
        const insert = ocsToWcs(entity.insert, entity.extrusion)
        const child: DrawContext = {
          matrix: multiply(matrix, blockTransform(insert, entity.rotation, entity.xscale, entity.yscale, block.basePoint)),
          blockColor: properties(entity, context).color,
          depth: context.depth + 1,
        }
        for (const blockEntity of block.entities) {
          drawPrimitive(blockEntity, child)
        }
        break
      }
    }
  }

  const root: DrawContext = { matrix: IDENTITY, blockColor: 7, depth: 0 }
  for (const entity of entities) {
    try {
      if (entity instanceof Dimension) {
        // composite entity, its block content is drawn in place
        const context = { ...root, blockColor: entity.dxf.color }
        for (const child of entity.virtualEntities()) {
          drawPrimitive(child, context)
        }
      } else {
        drawPrimitive(entity, root)
      }
    } catch (error) {
      warn(`Error occurred: ${error}`, entity)
    }
  }
}
