import type { DxfRecordReadonly } from '@dxfom/dxf'
import { ARROWS, arrowName, isAcadArrow } from './arrows'
import type { NameResolver, TableEntry } from './Document'
import {
  DIMSTYLE_SCHEMA,
  DXF12,
  DXF2007,
  parseDimStyleValue,
  type DimStyleSchema,
  type DimStyleValue,
  type DxfVersion,
  type StyleField,
} from './dimstyleSchema'
import { NotFoundError, SchemaError, ValidationError, VersionGapError } from './errors'
import { DIMZIN_SUPPRESSES_LEADING_ZEROS, DIMZIN_SUPPRESSES_TRAILING_ZEROS } from './formatText'
import type { Warn } from './util'

export interface ArrowBlockResolver extends NameResolver {
  has(name: string): boolean
  /** Creates the BLOCK definition of a standard arrow if required and returns its name. */
  createArrowBlock(name: string): string
}

/** What a DIMSTYLE entry needs from its document. */
export interface DimStyleContext {
  readonly version: DxfVersion
  readonly warn: Warn
  readonly blocks: ArrowBlockResolver
  readonly linetypes: NameResolver
  readonly styles: NameResolver
}

export type ToleranceMode = 'none' | 'tolerance' | 'limits'

export const DEFAULT_TEXT_STYLE = 'Standard'

const DIMTAD: Readonly<Record<string, number>> = { above: 1, center: 0, below: 4, outside: 2, jis: 3 }
const DIMJUST: Readonly<Record<string, number>> = { center: 0, left: 1, right: 2, above1: 3, above2: 4 }
const MTEXT_INLINE_ALIGN: Readonly<Record<string, number>> = { BOTTOM: 0, MIDDLE: 1, TOP: 2 }

// group codes of the table entry itself, XDATA (>= 1000) is not loaded
const RECORD_CODES: ReadonlySet<number> = new Set([0, 100, 102, 105, 330, 360])

const zeroSuppression = (leadingZeros: boolean | undefined, trailingZeros: boolean | undefined) =>
  (leadingZeros === false ? DIMZIN_SUPPRESSES_LEADING_ZEROS : 0) + (trailingZeros === false ? DIMZIN_SUPPRESSES_TRAILING_ZEROS : 0)

const lookupOption = (options: Readonly<Record<string, number>>, key: string, attribute: string) => {
  const value = options[key]
  if (value === undefined) {
    throw new ValidationError(`Invalid ${attribute} value "${key}", expected one of ${Object.keys(options).join(', ')}.`)
  }
  return value
}

const coerceValue = (field: StyleField, value: DimStyleValue | boolean): DimStyleValue => {
  if (field.type === 'int' || field.type === 'float') {
    const n = typeof value === 'string' ? +value : Number(value)
    if ((typeof value === 'string' && value.trim() === '') || !Number.isFinite(n)) {
      throw new ValidationError(`DIMSTYLE attribute "${field.name}" requires a number, got "${value}".`)
    }
    return field.type === 'int' ? Math.trunc(n) : n
  }
  return String(value)
}

interface Callback {
  get(): DimStyleValue | undefined
  set(value: string): void
}

export interface TextAlignOptions {
  /** `center`, `left`, `right`, `above1` or `above2`, requires DXF R2000 */
  readonly halign?: string
  /** `above`, `center` or `below` */
  readonly valign?: string
  /** vertical text shift if `valign` is `center`, > 0 upward */
  readonly vshift?: number
}

export interface TextFormatOptions {
  readonly prefix?: string
  readonly postfix?: string
  /** rounds all distances to a multiple of this value */
  readonly rnd?: number
  /** decimal places, requires DXF R2000 */
  readonly dec?: number
  /** decimal separator, requires DXF R2000 */
  readonly sep?: string
  /** `false` suppresses leading zeros */
  readonly leadingZeros?: boolean
  /** `false` suppresses trailing zeros */
  readonly trailingZeros?: boolean
}

export interface DimlineFormatOptions {
  readonly color?: number
  /** requires DXF R2007 */
  readonly linetype?: string
  /** 13 = 0.13 mm, requires DXF R2000 */
  readonly lineweight?: number
  readonly extension?: number
  readonly disable1?: boolean
  readonly disable2?: boolean
}

export interface ExtlineFormatOptions {
  readonly color?: number
  readonly lineweight?: number
  /** length above the dimension line */
  readonly extension?: number
  /** offset from the measurement point */
  readonly offset?: number
  /** fixed length below the dimension line, requires DXF R2007 */
  readonly fixedLength?: number
}

export interface ExtlineOptions {
  readonly linetype?: string
  readonly disable?: boolean
}

export interface ToleranceFormatOptions {
  readonly hfactor?: number
  readonly dec?: number
  readonly leadingZeros?: boolean
  readonly trailingZeros?: boolean
}

export interface ToleranceOptions extends ToleranceFormatOptions {
  /** same as upper if unset */
  readonly lower?: number
  /** `TOP`, `MIDDLE` or `BOTTOM` */
  readonly align?: string
}

/** DIMSTYLE table entry. */
export class DimStyle implements TableEntry {
  readonly dxftype = 'DIMSTYLE'
  private readonly values = new Map<string, DimStyleValue>()

  constructor(readonly doc: DimStyleContext, readonly handle: string, readonly schema: DimStyleSchema = DIMSTYLE_SCHEMA) {}

  /** New entry with every attribute of the document's DXF version set to its default value. */
  static create(doc: DimStyleContext, handle: string, name: string) {
    const dimStyle = new DimStyle(doc, handle)
    for (const field of dimStyle.schema) {
      if (field.kind === 'plain' && field.defaultValue !== undefined && dimStyle.supportsDxfAttrib(field.name)) {
        dimStyle.values.set(field.name, field.defaultValue)
      }
    }
    dimStyle.values.set('name', name)
    return dimStyle
  }

  /** Loads the attributes of `record` the document's DXF version supports. */
  static load(doc: DimStyleContext, handle: string, record: DxfRecordReadonly) {
    const dimStyle = new DimStyle(doc, handle)
    const markerIndex = record.findIndex(([groupCode, value]) => groupCode === 100 && value.trim() === 'AcDbDimStyleTableRecord')
    const unprocessed: number[] = []
    // the first group code 70 holds the flags, a later one dimtfillclr
    let hasFlags = false
    for (const [groupCode, value] of record.slice(markerIndex + 1)) {
      if (groupCode === 2) {
        dimStyle.values.set('name', value.trim())
        continue
      }
      if (groupCode === 70 && !hasFlags) {
        dimStyle.values.set('flags', parseInt(value, 10) || 0)
        hasFlags = true
        continue
      }
      const field = dimStyle.schema.fieldByCode(groupCode)
      if (!field) {
        groupCode >= 1000 || RECORD_CODES.has(groupCode) || unprocessed.push(groupCode)
        continue
      }
      if (!dimStyle.supportsDxfAttrib(field.name)) {
        continue
      }
      if (field.kind === 'callback') {
        // DXF R12 stores arrow names instead of block record handles
        dimStyle.supportsDxfAttrib(`${field.name}_handle`) || dimStyle.values.set(field.name, value.trim())
        continue
      }
      dimStyle.values.set(field.name, parseDimStyleValue(field, value))
    }
    if (unprocessed.length !== 0 && doc.version > DXF12) {
      doc.warn(`DIMSTYLE "${dimStyle.name}": unprocessed group codes ${unprocessed.join(', ')}.`)
    }
    return dimStyle
  }

  get name() {
    return String(this.values.get('name') ?? 'Standard')
  }

  get version() {
    return this.doc.version
  }

  supportsDxfAttrib(name: string) {
    return this.schema.supports(name, this.version)
  }

  private checkVersion(field: StyleField) {
    if (this.version < field.minVersion) {
      throw new VersionGapError(`DIMSTYLE attribute "${field.name}" requires DXF version ${field.minVersion} or later, document is ${this.version}.`)
    }
  }

  /**
   * Returns the stored value, `defaultValue` if unset.
   * Callback attributes are resolved by the document and never fail for older DXF versions.
   */
  getDxfAttrib(name: string, defaultValue?: DimStyleValue): DimStyleValue | undefined {
    const field = this.schema.get(name)
    if (field.kind === 'callback') {
      return this.callback(name).get() ?? defaultValue
    }
    this.checkVersion(field)
    return this.values.get(name) ?? defaultValue
  }

  setDxfAttrib(name: string, value: DimStyleValue | boolean) {
    const field = this.schema.get(name)
    this.checkVersion(field)
    if (field.kind === 'callback') {
      if (typeof value !== 'string') {
        throw new ValidationError(`DIMSTYLE attribute "${name}" requires a name, got "${value}".`)
      }
      this.callback(name).set(value)
    } else {
      this.values.set(name, coerceValue(field, value))
    }
  }

  hasDxfAttrib(name: string) {
    const field = this.schema.get(name)
    if (field.kind === 'callback') {
      return this.values.has(`${name}_handle`) || this.values.has(name)
    }
    return this.values.has(name)
  }

  discard(name: string) {
    this.schema.get(name)
    this.values.delete(name)
  }

  private callback(name: string): Callback {
    switch (name) {
      case 'dimblk':
      case 'dimblk1':
      case 'dimblk2':
      case 'dimldrblk':
        return { get: () => this.getArrowBlockName(name), set: value => this.setBlockHandle(name, value) }
      case 'dimtxsty':
        return { get: () => this.getTextStyle(), set: value => this.setTextStyle(value) }
      case 'dimltype':
      case 'dimltex1':
      case 'dimltex2':
        return { get: () => this.getLinetypeName(name), set: value => this.setLinetypeHandle(name, value) }
    }
    throw new SchemaError(`DIMSTYLE attribute "${name}" has no callbacks.`)
  }

  private setBlockHandle(name: string, arrow: string) {
    const handleAttrib = `${name}_handle`
    const blocks = this.doc.blocks
    if (!this.supportsDxfAttrib(handleAttrib)) {
      if (!isAcadArrow(arrow) && !blocks.has(arrow)) {
        throw new ValidationError(`Block "${arrow}" does not exist.`)
      }
      this.values.set(name, arrow)
      return
    }
    if (arrow === ARROWS.closedFilled) {
      // the default arrow requires no BLOCK definition
      this.values.delete(handleAttrib)
      return
    }
    const blockName = isAcadArrow(arrow) ? blocks.createArrowBlock(arrow) : arrow
    if (!blocks.has(blockName)) {
      throw new ValidationError(`Block "${arrow}" does not exist.`)
    }
    this.values.set(handleAttrib, blocks.resolve(blockName))
  }

  private getArrowBlockName(name: string) {
    const handleAttrib = `${name}_handle`
    if (!this.supportsDxfAttrib(handleAttrib)) {
      const value = this.values.get(name)
      return value === undefined ? ARROWS.closedFilled : String(value)
    }
    const handle = this.values.get(handleAttrib)
    if (handle === undefined || handle === '0') {
      return ARROWS.closedFilled
    }
    try {
      return arrowName(this.doc.blocks.reverse(String(handle)))
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error
      }
      this.doc.warn(`DIMSTYLE "${this.name}": invalid block record handle #${handle} of ${name}.`)
      return ARROWS.closedFilled
    }
  }

  private getTextStyle() {
    if (!this.supportsDxfAttrib('dimtxsty_handle')) {
      return DEFAULT_TEXT_STYLE
    }
    const handle = this.values.get('dimtxsty_handle')
    if (handle === undefined) {
      this.doc.warn(`DIMSTYLE "${this.name}": text style handle not set.`)
      return DEFAULT_TEXT_STYLE
    }
    try {
      return this.doc.styles.reverse(String(handle))
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error
      }
      this.doc.warn(`DIMSTYLE "${this.name}": invalid text style handle #${handle}.`)
      return DEFAULT_TEXT_STYLE
    }
  }

  private setTextStyle(name: string) {
    const handle = this.doc.styles.resolve(name)
    if (this.supportsDxfAttrib('dimtxsty_handle')) {
      this.values.set('dimtxsty_handle', handle)
    } else {
      this.doc.warn('Text style support for DIMSTYLE requires DXF R2000 or later.')
    }
  }

  private getLinetypeName(name: string) {
    const handle = this.values.get(`${name}_handle`)
    if (handle === undefined) {
      return
    }
    try {
      return this.doc.linetypes.reverse(String(handle))
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error
      }
      this.doc.warn(`DIMSTYLE "${this.name}": invalid linetype handle #${handle} of ${name}.`)
      return
    }
  }

  private setLinetypeHandle(name: string, linetype: string) {
    this.values.set(`${name}_handle`, this.doc.linetypes.resolve(linetype))
  }

  get toleranceMode(): ToleranceMode {
    if (this.getDxfAttrib('dimtol', 0)) {
      return 'tolerance'
    }
    return this.getDxfAttrib('dimlim', 0) ? 'limits' : 'none'
  }

  set toleranceMode(mode: ToleranceMode) {
    this.setDxfAttrib('dimtol', mode === 'tolerance' ? 1 : 0)
    this.setDxfAttrib('dimlim', mode === 'limits' ? 1 : 0)
  }

  /**
   * Sets arrows by block names or standard arrow names and disables ticks.
   * `blk` is used for both arrows if dimsah is 0, `blk1` and `blk2` if dimsah is 1.
   */
  setArrows(blk = '', blk1 = '', blk2 = '') {
    this.setDxfAttrib('dimblk', blk)
    this.setDxfAttrib('dimblk1', blk1)
    this.setDxfAttrib('dimblk2', blk2)
    this.setDxfAttrib('dimtsz', 0)
  }

  /** Oblique stroke as tick, disables arrows. */
  setTick(size = 1) {
    this.setDxfAttrib('dimtsz', size)
  }

  setTextAlign({ halign, valign, vshift }: TextAlignOptions) {
    if (valign) {
      const key = valign.toLowerCase()
      this.setDxfAttrib('dimtad', lookupOption(DIMTAD, key, 'valign'))
      if (key === 'center' && vshift !== undefined) {
        this.setDxfAttrib('dimtvp', vshift)
      }
    }
    if (halign) {
      this.setDxfAttrib('dimjust', lookupOption(DIMJUST, halign.toLowerCase(), 'halign'))
    }
  }

  setTextFormat({ prefix = '', postfix = '', rnd, dec, sep, leadingZeros = true, trailingZeros = true }: TextFormatOptions = {}) {
    if (prefix || postfix) {
      this.setDxfAttrib('dimpost', prefix + '<>' + postfix)
    }
    if (rnd !== undefined) {
      this.setDxfAttrib('dimrnd', rnd)
    }
    this.setDxfAttrib('dimzin', zeroSuppression(leadingZeros, trailingZeros))
    if (dec !== undefined) {
      this.setDxfAttrib('dimdec', dec)
    }
    if (sep !== undefined) {
      this.setDxfAttrib('dimdsep', sep.charCodeAt(0))
    }
  }

  setDimlineFormat({ color, linetype, lineweight, extension, disable1, disable2 }: DimlineFormatOptions) {
    color !== undefined && this.setDxfAttrib('dimclrd', color)
    extension !== undefined && this.setDxfAttrib('dimdle', extension)
    lineweight !== undefined && this.setDxfAttrib('dimlwd', lineweight)
    disable1 !== undefined && this.setDxfAttrib('dimsd1', disable1)
    disable2 !== undefined && this.setDxfAttrib('dimsd2', disable2)
    linetype !== undefined && this.setDxfAttrib('dimltype', linetype)
  }

  setExtlineFormat({ color, lineweight, extension, offset, fixedLength }: ExtlineFormatOptions) {
    color !== undefined && this.setDxfAttrib('dimclre', color)
    extension !== undefined && this.setDxfAttrib('dimexe', extension)
    offset !== undefined && this.setDxfAttrib('dimexo', offset)
    lineweight !== undefined && this.setDxfAttrib('dimlwe', lineweight)
    if (fixedLength !== undefined) {
      this.setDxfAttrib('dimfxlon', 1)
      this.setDxfAttrib('dimfxl', fixedLength)
    }
  }

  setExtline1({ linetype, disable = false }: ExtlineOptions) {
    disable && this.setDxfAttrib('dimse1', 1)
    linetype !== undefined && this.setDxfAttrib('dimltex1', linetype)
  }

  setExtline2({ linetype, disable = false }: ExtlineOptions) {
    disable && this.setDxfAttrib('dimse2', 1)
    linetype !== undefined && this.setDxfAttrib('dimltex2', linetype)
  }

  /** Linetypes of dimension and extension lines, ignored before DXF R2007. */
  setLinetypes({ dimline, ext1, ext2 }: { readonly dimline?: string; readonly ext1?: string; readonly ext2?: string }) {
    if (this.version < DXF2007) {
      this.doc.warn('Linetype support for DIMSTYLE requires DXF R2007 or later.')
      return
    }
    dimline !== undefined && this.setDxfAttrib('dimltype', dimline)
    ext1 !== undefined && this.setDxfAttrib('dimltex1', ext1)
    ext2 !== undefined && this.setDxfAttrib('dimltex2', ext2)
  }

  /** Tolerance formatting attributes are skipped where the DXF version has no field for them. */
  private setIfSupported(name: string, value: DimStyleValue) {
    this.supportsDxfAttrib(name) && this.setDxfAttrib(name, value)
  }

  private setToleranceFormat({ dec, leadingZeros, trailingZeros }: ToleranceFormatOptions) {
    if (leadingZeros !== undefined || trailingZeros !== undefined) {
      this.setIfSupported('dimtzin', zeroSuppression(leadingZeros, trailingZeros))
    }
    dec !== undefined && this.setIfSupported('dimtdec', dec)
  }

  /** Enables tolerances and disables limits. */
  setTolerance(upper: number, { lower, hfactor = 1, align, ...format }: ToleranceOptions = {}) {
    this.toleranceMode = 'tolerance'
    this.setDxfAttrib('dimtp', upper)
    this.setDxfAttrib('dimtm', lower ?? upper)
    this.setIfSupported('dimtfac', hfactor)
    if (align !== undefined) {
      this.setIfSupported('dimtolj', lookupOption(MTEXT_INLINE_ALIGN, align.toUpperCase(), 'align'))
    }
    this.setToleranceFormat(format)
  }

  /** Enables limits and disables tolerances, limits are always bottom aligned. */
  setLimits(upper: number, lower: number, { hfactor = 1, ...format }: ToleranceFormatOptions = {}) {
    this.toleranceMode = 'limits'
    this.setDxfAttrib('dimtp', upper)
    this.setDxfAttrib('dimtm', lower)
    this.setIfSupported('dimtfac', hfactor)
    this.setIfSupported('dimtolj', MTEXT_INLINE_ALIGN.BOTTOM)
    this.setToleranceFormat(format)
  }

  /** Stored DIMxxx attributes. */
  *dimAttribs(): Generator<[string, DimStyleValue]> {
    for (const [name, value] of this.values) {
      if (name.startsWith('dim')) {
        yield [name, value]
      }
    }
  }

  /** Copies this style into `$DIMxxx` header variables. */
  copyToHeader(header: Map<string, DimStyleValue>) {
    header.set('$DIMSTYLE', this.name)
    for (const field of this.schema) {
      if (!field.name.startsWith('dim') || field.name.endsWith('_handle') || !this.supportsDxfAttrib(field.name)) {
        continue
      }
      const value = this.getDxfAttrib(field.name)
      value !== undefined && header.set('$' + field.name.toUpperCase(), value)
    }
  }

  /** Group code tags of the ordered attribute list of `version`. */
  exportDxfAttribs(version: DxfVersion = this.version): [number, string][] {
    if (version > DXF12 && !this.values.has('dimtxsty_handle')) {
      this.values.set('dimtxsty_handle', this.doc.styles.resolve(DEFAULT_TEXT_STYLE))
    }
    const tags: [number, string][] = []
    for (const field of this.schema.exportFields(version)) {
      const value = field.kind === 'callback' ? this.getDxfAttrib(field.name) : this.values.get(field.name) ?? field.defaultValue
      value !== undefined && tags.push([field.code, String(value)])
    }
    return tags
  }
}
