export class DxfDimensionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Unknown DIMSTYLE attribute name. */
export class SchemaError extends DxfDimensionError {}

/** Referenced table entry, block or handle does not exist. */
export class NotFoundError extends DxfDimensionError {}

/** Attribute exists, but requires a newer DXF version than the document has. */
export class VersionGapError extends DxfDimensionError {}

export class ValidationError extends DxfDimensionError {}

export class UnsupportedDimensionTypeError extends DxfDimensionError {}
