import type { DimStyle } from './DimStyle'
import { DIMSTYLE_SCHEMA, LATEST_DXF_VERSION, type DimStyleSchema, type DimStyleValue } from './dimstyleSchema'
import { SchemaError, VersionGapError } from './errors'

/** DIMSTYLE attributes of a single DIMENSION which replace the values of its DIMSTYLE. */
export type OverrideMap = Readonly<Record<string, DimStyleValue>>

/**
 * Effective DIMSTYLE attributes of a DIMENSION.
 * Resolved values are cached for the lifetime of the object, create a new one to see changes.
 */
export class DimStyleOverride {
  private readonly cache = new Map<string, DimStyleValue | undefined>()

  constructor(
    readonly dimStyle: DimStyle,
    readonly override: OverrideMap = {},
    private readonly schema: DimStyleSchema = DIMSTYLE_SCHEMA,
  ) {}

  get(name: string, defaultValue?: DimStyleValue): DimStyleValue | undefined {
    if (this.cache.has(name)) {
      return this.cache.get(name)
    }
    // checked against the latest version, R12 documents render with the same algorithm
    if (!this.schema.supports(name, LATEST_DXF_VERSION)) {
      throw new SchemaError(`Invalid DXF attribute "${name}" for DIMSTYLE.`)
    }
    let value: DimStyleValue | undefined
    if (Object.hasOwn(this.override, name)) {
      value = this.override[name]
    } else {
      try {
        value = this.dimStyle.getDxfAttrib(name, defaultValue)
      } catch (error) {
        if (!(error instanceof VersionGapError)) {
          throw error
        }
        value = defaultValue
      }
    }
    this.cache.set(name, value)
    return value
  }

  number(name: string, defaultValue: number) {
    const value = Number(this.get(name, defaultValue))
    return Number.isFinite(value) ? value : defaultValue
  }

  string(name: string, defaultValue: string) {
    const value = this.get(name, defaultValue)
    return value === undefined ? defaultValue : String(value)
  }

  setAcadDstyle(dimension: { setAcadDstyle(override: OverrideMap): void }) {
    dimension.setAcadDstyle(this.override)
  }
}
