import schemaData from './dimstyleFields.json'
import { SchemaError } from './errors'

/** `$ACADVER` tag of a DXF version, tags of later versions sort greater. */
export type DxfVersion = string

export const DXF12: DxfVersion = 'AC1009'
export const DXF2000: DxfVersion = 'AC1015'
export const DXF2004: DxfVersion = 'AC1018'
export const DXF2007: DxfVersion = 'AC1021'
export const DXF2018: DxfVersion = 'AC1032'
export const LATEST_DXF_VERSION = DXF2018

/** Group code of attributes which exist only in memory. */
export const VIRTUAL_TAG = -666

export type DimStyleValue = string | number
export type StyleFieldType = 'string' | 'int' | 'float' | 'handle'
export type StyleFieldKind = 'plain' | 'callback'

export interface StyleField {
  readonly name: string
  readonly code: number
  readonly type: StyleFieldType
  readonly defaultValue?: DimStyleValue
  readonly minVersion: DxfVersion
  /** `callback` attributes are resolved by getter/setter pairs of the DIMSTYLE entry and never stored. */
  readonly kind: StyleFieldKind
}

export interface ExportLists {
  readonly R12: readonly string[]
  readonly R2000: readonly string[]
  readonly R2007: readonly string[]
}

export class DimStyleSchema {
  private readonly fields = new Map<string, StyleField>()
  private readonly codes = new Map<number, StyleField>()

  constructor(fields: readonly StyleField[], private readonly exportLists: ExportLists) {
    for (const field of fields) {
      if (this.fields.has(field.name)) {
        throw new SchemaError(`Duplicate DIMSTYLE attribute "${field.name}".`)
      }
      this.fields.set(field.name, field)
      // code 70 of "flags" belongs to the symbol table record subclass
      if (field.name.startsWith('dim') && field.code !== VIRTUAL_TAG) {
        this.codes.set(field.code, field)
      }
    }
    for (const list of [exportLists.R12, exportLists.R2000, exportLists.R2007]) {
      for (const name of list) {
        this.get(name)
      }
    }
  }

  has(name: string) {
    return this.fields.has(name)
  }

  get(name: string): StyleField {
    const field = this.fields.get(name)
    if (!field) {
      throw new SchemaError(`Invalid DXF attribute "${name}" for DIMSTYLE.`)
    }
    return field
  }

  supports(name: string, version: DxfVersion) {
    const field = this.fields.get(name)
    return field !== undefined && version >= field.minVersion
  }

  fieldByCode(code: number) {
    return this.codes.get(code)
  }

  exportFields(version: DxfVersion): readonly StyleField[] {
    const names = version <= DXF12 ? this.exportLists.R12 : version < DXF2007 ? this.exportLists.R2000 : this.exportLists.R2007
    return names.map(name => this.get(name))
  }

  [Symbol.iterator]() {
    return this.fields.values()
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null
const isStringArray = (value: unknown): value is string[] => Array.isArray(value) && value.every(item => typeof item === 'string')
const FIELD_TYPES: readonly string[] = ['string', 'int', 'float', 'handle'] satisfies StyleFieldType[]
const isFieldType = (value: unknown): value is StyleFieldType => typeof value === 'string' && FIELD_TYPES.includes(value)

const parseField = (data: unknown, index: number): StyleField => {
  if (!isRecord(data)) {
    throw new SchemaError(`DIMSTYLE field #${index} is not an object.`)
  }
  const { name, code, type, minVersion = DXF12, kind = 'plain' } = data
  const defaultValue = data.default
  if (typeof name !== 'string' || typeof code !== 'number' || !isFieldType(type) || typeof minVersion !== 'string') {
    throw new SchemaError(`DIMSTYLE field #${index} is malformed.`)
  }
  if (kind !== 'plain' && kind !== 'callback') {
    throw new SchemaError(`DIMSTYLE field "${name}" has an unknown kind.`)
  }
  if (defaultValue !== undefined && typeof defaultValue !== 'string' && typeof defaultValue !== 'number') {
    throw new SchemaError(`DIMSTYLE field "${name}" has an invalid default value.`)
  }
  return { name, code, type, defaultValue, minVersion, kind }
}

export const parseDimStyleSchema = (data: unknown) => {
  if (!isRecord(data) || !Array.isArray(data.fields) || !isRecord(data.exportLists)) {
    throw new SchemaError('DIMSTYLE schema requires "fields" and "exportLists".')
  }
  const { R12, R2000, R2007 } = data.exportLists
  if (!isStringArray(R12) || !isStringArray(R2000) || !isStringArray(R2007)) {
    throw new SchemaError('DIMSTYLE export lists must be lists of attribute names.')
  }
  return new DimStyleSchema(data.fields.map(parseField), { R12, R2000, R2007 })
}

export const DIMSTYLE_SCHEMA = parseDimStyleSchema(schemaData)

export const parseDimStyleValue = (field: StyleField, value: string): DimStyleValue => {
  switch (field.type) {
    case 'int':
      return parseInt(value, 10)
    case 'float':
      return +value
    case 'handle':
      return value.trim()
    default:
      return value
  }
}
