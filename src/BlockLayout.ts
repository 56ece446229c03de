import { createArrowBlock } from './arrows'
import type { EntityDb, NameResolver, TableEntry } from './Document'
import { NotFoundError, ValidationError } from './errors'
import type { Vec3 } from './vector'

export interface GraphicAttribs {
  readonly layer: string
  /** ACI color, 0 = BYBLOCK, 256 = BYLAYER */
  readonly color: number
  /** 0 = opaque, 1 = fully transparent, unset = opaque */
  readonly transparency?: number
  readonly extrusion?: Vec3
}

export interface LinePrimitive extends GraphicAttribs {
  readonly dxftype: 'LINE'
  readonly start: Vec3
  readonly end: Vec3
}

/** Filled polygon, vertices in drawing order. */
export interface SolidPrimitive extends GraphicAttribs {
  readonly dxftype: 'SOLID'
  readonly points: readonly Vec3[]
}

export type TextAlignment = 'LEFT' | 'MIDDLE_CENTER'

export interface TextPrimitive extends GraphicAttribs {
  readonly dxftype: 'TEXT'
  readonly text: string
  /** OCS */
  readonly insert: Vec3
  readonly height: number
  readonly rotation: number
  readonly style: string
  readonly align: TextAlignment
}

export interface InsertPrimitive extends GraphicAttribs {
  readonly dxftype: 'INSERT'
  readonly name: string
  /** OCS */
  readonly insert: Vec3
  readonly rotation: number
  readonly xscale: number
  readonly yscale: number
}

export interface PointPrimitive extends GraphicAttribs {
  readonly dxftype: 'POINT'
  readonly location: Vec3
}

export type DxfPrimitive = LinePrimitive | SolidPrimitive | TextPrimitive | InsertPrimitive | PointPrimitive

const defaultGraphicAttribs = (attribs: Partial<GraphicAttribs>): GraphicAttribs => ({ layer: '0', color: 256, ...attribs })

export interface TextOptions {
  readonly insert: Vec3
  readonly height?: number
  readonly rotation?: number
  readonly style?: string
  readonly align?: TextAlignment
}

export interface BlockRefOptions {
  readonly rotation?: number
  readonly xscale?: number
  readonly yscale?: number
}

export class BlockLayout {
  readonly entities: DxfPrimitive[] = []

  constructor(readonly name: string, readonly blockRecordHandle: string, readonly basePoint: Vec3 = [0, 0, 0]) {}

  add(entity: DxfPrimitive) {
    this.entities.push(entity)
    return entity
  }

  addLine(start: Vec3, end: Vec3, attribs: Partial<GraphicAttribs> = {}) {
    return this.add({ ...defaultGraphicAttribs(attribs), dxftype: 'LINE', start, end })
  }

  addSolid(points: readonly Vec3[], attribs: Partial<GraphicAttribs> = {}) {
    return this.add({ ...defaultGraphicAttribs(attribs), dxftype: 'SOLID', points })
  }

  addText(text: string, { insert, height = 2.5, rotation = 0, style = 'Standard', align = 'LEFT' }: TextOptions, attribs: Partial<GraphicAttribs> = {}) {
    return this.add({ ...defaultGraphicAttribs(attribs), dxftype: 'TEXT', text, insert, height, rotation, style, align })
  }

  addBlockRef(name: string, insert: Vec3, { rotation = 0, xscale = 1, yscale = 1 }: BlockRefOptions = {}, attribs: Partial<GraphicAttribs> = {}) {
    return this.add({ ...defaultGraphicAttribs(attribs), dxftype: 'INSERT', name, insert, rotation, xscale, yscale })
  }

  addPoint(location: Vec3, attribs: Partial<GraphicAttribs> = {}) {
    return this.add({ ...defaultGraphicAttribs(attribs), dxftype: 'POINT', location })
  }
}

export interface BlockRecord extends TableEntry {
  readonly dxftype: 'BLOCK_RECORD'
}

/** BLOCK definitions by name, resolves block record handles. */
export class BlockTable implements NameResolver {
  private readonly blocks = new Map<string, BlockLayout>()
  private readonly byHandle = new Map<string, BlockLayout>()
  private anonymousBlockCounter = 0

  constructor(private readonly db: EntityDb) {}

  has(name: string) {
    return this.blocks.has(name.toLowerCase())
  }

  get(name: string) {
    const block = this.blocks.get(name.toLowerCase())
    if (!block) {
      throw new NotFoundError(`Block "${name}" does not exist.`)
    }
    return block
  }

  new(name: string, basePoint?: Vec3, handle?: string) {
    if (this.has(name)) {
      throw new ValidationError(`Block "${name}" already exists.`)
    }
    const record: BlockRecord = { dxftype: 'BLOCK_RECORD', name, handle: handle ?? this.db.nextHandle() }
    this.db.add(record)
    const block = new BlockLayout(name, record.handle, basePoint)
    this.blocks.set(name.toLowerCase(), block)
    this.byHandle.set(record.handle, block)
    return block
  }

  delete(name: string) {
    const block = this.get(name)
    this.blocks.delete(name.toLowerCase())
    this.byHandle.delete(block.blockRecordHandle)
    this.db.delete(block.blockRecordHandle)
  }

  /** Allocates a block with a unique name like `*D1`. */
  newAnonymousBlock(typeChar = 'U') {
    let name: string
    do {
      name = `*${typeChar}${++this.anonymousBlockCounter}`
    } while (this.has(name))
    return this.new(name)
  }

  createArrowBlock(name: string) {
    return createArrowBlock(this, name)
  }

  resolve(name: string) {
    return this.get(name).blockRecordHandle
  }

  reverse(handle: string) {
    const block = this.byHandle.get(handle)
    if (!block) {
      throw new NotFoundError(`No block record with handle #${handle}.`)
    }
    return block.name
  }

  [Symbol.iterator]() {
    return this.blocks.values()
  }
}
