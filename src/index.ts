export * from './arrows'
export * from './BlockLayout'
export * from './createSvgString'
export * from './Dimension'
export * from './dimensionRenderer'
export * from './DimStyle'
export * from './DimStyleOverride'
export * from './dimstyleSchema'
export * from './Document'
export * from './dstyle'
export * from './errors'
export * from './formatText'
export * from './frontend'
export * from './loadDocument'
export { UCS, PassThroughUCS, OCS } from './vector'
export type { Vec3, UCSOptions } from './vector'
