import { describe, expect, it, vi } from 'vitest'
import type { InsertPrimitive } from './BlockLayout'
import { Document } from './Document'
import { drawEntities, type DrawingBackend } from './frontend'

const createBackend = () => ({ drawLine: vi.fn(), drawFilledPolygon: vi.fn(), drawText: vi.fn(), drawPoint: vi.fn() }) satisfies DrawingBackend

const point = (x: number, y: number) => [expect.closeTo(x, 9), expect.closeTo(y, 9), 0]

const insert = (name: string, attribs: Partial<InsertPrimitive> = {}): InsertPrimitive => ({
  dxftype: 'INSERT',
  name,
  insert: [0, 0, 0],
  rotation: 0,
  xscale: 1,
  yscale: 1,
  layer: '0',
  color: 256,
  ...attribs,
})

describe('drawEntities', () => {
  it('draws primitives', () => {
    const doc = new Document({ warn: () => {} })
    doc.modelspace.push({ dxftype: 'LINE', layer: 'A', color: 1, start: [0, 0, 0], end: [4, 0, 0] })
    const backend = createBackend()
    drawEntities(doc, doc.modelspace, backend)
    expect(backend.drawLine).toHaveBeenCalledWith([0, 0, 0], [4, 0, 0], { color: 1, layer: 'A', transparency: 0 })
  })

  it('expands block references', () => {
    const doc = new Document({ warn: () => {} })
    doc.blocks.new('Box', [1, 0, 0]).addLine([1, 0, 0], [2, 0, 0], { color: 0 })
    doc.modelspace.push(insert('Box', { insert: [10, 0, 0], rotation: 90, xscale: 2, yscale: 2, color: 3 }))
    const backend = createBackend()
    drawEntities(doc, doc.modelspace, backend)
    expect(backend.drawLine).toHaveBeenCalledTimes(1)
    expect(backend.drawLine.mock.calls[0]).toEqual([point(10, 0), point(10, 2), { color: 3, layer: '0', transparency: 0 }])
  })

  it('draws the geometry of dimensions', () => {
    const doc = new Document({ warn: () => {} })
    doc.addLinearDim({ base: [3, 5, 0], p1: [0, 0, 0], p2: [10, 0, 0] })
    const backend = createBackend()
    drawEntities(doc, doc.modelspace, backend)
    expect(backend.drawText).toHaveBeenCalledTimes(1)
    expect(backend.drawText.mock.calls[0]).toEqual([
      '10',
      point(5, 6.875),
      { color: 256, layer: '0', transparency: 0, height: 2.5, rotation: 0, style: 'Standard', align: 'MIDDLE_CENTER' },
    ])
    expect(backend.drawLine).toHaveBeenCalledTimes(3)
    expect(backend.drawFilledPolygon).toHaveBeenCalledTimes(2)
    expect(backend.drawFilledPolygon.mock.calls[0][0]).toEqual([point(0, 5), point(2.5, 5 - 2.5 / 6), point(2.5, 5 + 2.5 / 6)])
    expect(backend.drawFilledPolygon.mock.calls[0][1]).toEqual({ color: 256, layer: '0', transparency: 0 })
    expect(backend.drawPoint).toHaveBeenCalledTimes(3)
  })

  it('skips entities which can not be drawn', () => {
    const warn = vi.fn()
    const doc = new Document({ warn })
    const dimension = doc.addLinearDim({ base: [3, 5, 0], p1: [0, 0, 0], p2: [10, 0, 0], override: { dimblk: 'Missing' } })
    doc.modelspace.push(insert('Unknown'))
    doc.modelspace.push({ dxftype: 'POINT', layer: '0', color: 256, location: [1, 1, 0] })
    const backend = createBackend()
    drawEntities(doc, doc.modelspace, backend)
    expect(warn).toHaveBeenCalledWith('Error occurred: NotFoundError: Undefined block: "Missing"', dimension)
    expect(warn).toHaveBeenCalledWith('Error occurred: NotFoundError: Block "Unknown" does not exist.', doc.modelspace[1])
    expect(backend.drawText).not.toHaveBeenCalled()
    expect(backend.drawPoint).toHaveBeenCalledWith([1, 1, 0], { color: 256, layer: '0', transparency: 0 })
  })

  it('stops at recursive block references', () => {
    const warn = vi.fn()
    const doc = new Document({ warn })
    doc.blocks.new('Loop').add(insert('Loop'))
    doc.modelspace.push(insert('Loop'))
    drawEntities(doc, doc.modelspace, createBackend())
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('Block nesting of "Loop" is too deep.')
  })
})
