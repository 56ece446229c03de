import { describe, expect, it } from 'vitest'
import { createSvgContents, createSvgString } from './createSvgString'
import { Document } from './Document'

describe('createSvgString', () => {
  it('creates an SVG document', () => {
    const doc = new Document({ warn: () => {} })
    doc.modelspace.push({ dxftype: 'LINE', layer: '0', color: 1, start: [0, 0, 0], end: [4, 3, 0] })
    expect(createSvgString(doc, { resolveColorIndex: () => 'red' })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 -3 4 3" width="4" height="3" stroke-width="0.5">' +
        '<line x2="4" y2="-3" stroke="red" vector-effect="non-scaling-stroke"/>' +
        '</svg>',
    )
  })

  it('escapes text and rounds coordinates', () => {
    const doc = new Document({ warn: () => {} })
    doc.header.set('$LUPREC', 2)
    doc.modelspace.push({ dxftype: 'TEXT', layer: '0', color: 256, text: 'A&B', insert: [1.234, 2, 0], height: 2.5, rotation: 0, style: 'Standard', align: 'LEFT' })
    const [s] = createSvgContents(doc)
    expect(s).toBe('<text x="1.23" y="-2" fill="currentColor" font-size="2.5" stroke="none" white-space="pre">A&amp;B</text>')
  })

  it('returns an empty view box without entities', () => {
    const doc = new Document({ warn: () => {} })
    expect(createSvgContents(doc)).toEqual(['', { x: 0, y: 0, w: 0, h: 0 }])
  })
})
