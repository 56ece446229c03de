import { BlockTable, type DxfPrimitive } from './BlockLayout'
import { Dimension, type DimensionAttribs } from './Dimension'
import { DIMENSION_TYPES } from './dimensionRenderer'
import { DimStyle } from './DimStyle'
import type { OverrideMap } from './DimStyleOverride'
import { DXF12, DXF2000, type DimStyleValue, type DxfVersion } from './dimstyleSchema'
import { NotFoundError, ValidationError } from './errors'
import type { Warn } from './util'
import type { Vec3 } from './vector'

/** Resolves names of table entries to handles and back. */
export interface NameResolver {
  resolve(name: string): string
  reverse(handle: string): string
}

export interface TableEntry {
  readonly handle: string
  readonly dxftype: string
  readonly name: string
}

export interface Linetype extends TableEntry {
  readonly dxftype: 'LTYPE'
  readonly description: string
  readonly pattern: readonly number[]
}

export interface TextStyle extends TableEntry {
  readonly dxftype: 'STYLE'
  readonly font: string
  readonly height: number
}

export interface DxfObject {
  readonly handle: string
  readonly dxftype: string
}

/** Objects of a document by handle, handles are upper case hex strings. */
export class EntityDb {
  private readonly objects = new Map<string, DxfObject>()
  private handleCounter = 0x20

  nextHandle() {
    let handle: string
    do {
      handle = (this.handleCounter++).toString(16).toUpperCase()
    } while (this.objects.has(handle))
    return handle
  }

  add(object: DxfObject) {
    const value = parseInt(object.handle, 16)
    if (value >= this.handleCounter) {
      this.handleCounter = value + 1
    }
    this.objects.set(object.handle, object)
  }

  has(handle: string) {
    return this.objects.has(handle)
  }

  delete(handle: string) {
    return this.objects.delete(handle)
  }

  get(handle: string) {
    const object = this.objects.get(handle)
    if (!object) {
      throw new NotFoundError(`Invalid handle #${handle}.`)
    }
    return object
  }
}

export class Table<T extends TableEntry> implements NameResolver {
  private readonly entries = new Map<string, T>()
  private readonly byHandle = new Map<string, T>()

  constructor(readonly name: string, private readonly db: EntityDb) {}

  has(name: string) {
    return this.entries.has(name.toLowerCase())
  }

  get(name: string) {
    const entry = this.entries.get(name.toLowerCase())
    if (!entry) {
      throw new NotFoundError(`${this.name} entry "${name}" does not exist.`)
    }
    return entry
  }

  add(entry: T) {
    if (this.has(entry.name)) {
      throw new ValidationError(`${this.name} entry "${entry.name}" already exists.`)
    }
    this.db.add(entry)
    this.entries.set(entry.name.toLowerCase(), entry)
    this.byHandle.set(entry.handle, entry)
    return entry
  }

  resolve(name: string) {
    return this.get(name).handle
  }

  reverse(handle: string) {
    const entry = this.byHandle.get(handle)
    if (!entry) {
      throw new NotFoundError(`No ${this.name} entry with handle #${handle}.`)
    }
    return entry.name
  }

  [Symbol.iterator]() {
    return this.entries.values()
  }
}

export interface DocumentOptions {
  readonly version?: DxfVersion
  readonly warn?: Warn
  /** Creates the default table entries, loaders disable this and call `setupDefaults()` afterwards. */
  readonly setup?: boolean
}

export type ModelspaceEntity = DxfPrimitive | Dimension

export interface LinearDimOptions {
  readonly base: Vec3
  readonly p1: Vec3
  readonly p2: Vec3
  readonly angle?: number
  readonly dimstyle?: string
  readonly text?: string
  readonly override?: OverrideMap
  readonly layer?: string
  readonly color?: number
}

export class Document {
  readonly version: DxfVersion
  readonly warn: Warn
  readonly db = new EntityDb()
  readonly header = new Map<string, DimStyleValue>()
  readonly blocks = new BlockTable(this.db)
  readonly linetypes = new Table<Linetype>('LTYPE', this.db)
  readonly styles = new Table<TextStyle>('STYLE', this.db)
  readonly dimstyles = new Table<DimStyle>('DIMSTYLE', this.db)
  readonly modelspace: ModelspaceEntity[] = []

  constructor({ version = DXF2000, warn = console.debug, setup = true }: DocumentOptions = {}) {
    this.version = version
    this.warn = warn
    if (setup) {
      this.setupDefaults()
    }
  }

  setupDefaults() {
    for (const [name, description] of [['ByBlock', ''], ['ByLayer', ''], ['Continuous', 'Solid line']]) {
      this.linetypes.has(name) || this.addLinetype(name, description)
    }
    this.styles.has('Standard') || this.addTextStyle('Standard')
    this.dimstyles.has('Standard') || this.addDimStyle('Standard')
  }

  lookup(handle: string) {
    return this.db.get(handle)
  }

  addLinetype(name: string, description = '', pattern: readonly number[] = []) {
    return this.linetypes.add({ dxftype: 'LTYPE', handle: this.db.nextHandle(), name, description, pattern })
  }

  addTextStyle(name: string, font = 'txt', height = 0) {
    return this.styles.add({ dxftype: 'STYLE', handle: this.db.nextHandle(), name, font, height })
  }

  /** New DIMSTYLE with all attributes of the document's DXF version set to their defaults. */
  addDimStyle(name: string) {
    const dimStyle = DimStyle.create(this, this.db.nextHandle(), name)
    if (this.version > DXF12 && this.styles.has('Standard')) {
      dimStyle.setDxfAttrib('dimtxsty', 'Standard')
    }
    return this.dimstyles.add(dimStyle)
  }

  addDimension(attribs: Partial<DimensionAttribs>, override: OverrideMap = {}) {
    const dimension = new Dimension(this, this.db.nextHandle(), attribs, override)
    this.db.add(dimension)
    this.modelspace.push(dimension)
    return dimension
  }

  /** Horizontal, vertical or rotated linear DIMENSION, call `render()` to create its geometry. */
  addLinearDim({ base, p1, p2, angle = 0, dimstyle = 'Standard', text = '<>', override, layer, color }: LinearDimOptions) {
    if (!this.dimstyles.has(dimstyle)) {
      throw new NotFoundError(`DIMSTYLE "${dimstyle}" does not exist.`)
    }
    return this.addDimension({ dimtype: DIMENSION_TYPES.linear, defpoint: base, defpoint2: p1, defpoint3: p2, angle, dimstyle, text, layer, color }, override)
  }
}
