import { DXF_COLOR_HEX } from '@dxfom/color/hex'
import { parseDxfTextContent, type DxfTextContentElement } from '@dxfom/text'
import type { Document } from './Document'
import { drawEntities, type DrawingBackend, type Properties, type TextProperties } from './frontend'
import { jsx } from './jsx-runtime'
import { escapeHtml, rotate, round, type Warn } from './util'
import type { Vec3 } from './vector'

export interface CreateSvgStringOptions {
  readonly warn: Warn
  readonly resolveColorIndex: (colorIndex: number) => string
  /** decimal places of coordinates, `$LUPREC` of the document by default */
  readonly precision: number
}

export interface ViewBox {
  readonly x: number
  readonly y: number
  readonly w: number
  readonly h: number
}

const { min, max } = Math

const TEXT_textDecorations = ({ k, o, u }: DxfTextContentElement) => {
  const decorations = []
  k && decorations.push('line-through')
  o && decorations.push('overline')
  u && decorations.push('underline')
  return decorations.join(' ')
}

/** SVG elements with y pointing down, collects the extents of everything drawn. */
export class SvgBackend implements DrawingBackend {
  private s = ''
  private minX = Infinity
  private maxX = -Infinity
  private minY = Infinity
  private maxY = -Infinity

  constructor(private readonly options: Pick<CreateSvgStringOptions, 'resolveColorIndex' | 'precision'>) {}

  private color({ color }: Properties) {
    return color === 0 || color === 256 ? 'currentColor' : this.options.resolveColorIndex(color)
  }

  private opacity({ transparency }: Properties) {
    return transparency > 0 ? round(1 - transparency, 3) : undefined
  }

  private x(x: number) {
    return round(x, this.options.precision)
  }

  private y(y: number) {
    return -round(y, this.options.precision)
  }

  private extend(xs: readonly number[], ys: readonly number[]) {
    this.minX = min(this.minX, ...xs)
    this.maxX = max(this.maxX, ...xs)
    this.minY = min(this.minY, ...ys)
    this.maxY = max(this.maxY, ...ys)
  }

  drawLine(start: Vec3, end: Vec3, properties: Properties) {
    const x1 = this.x(start[0])
    const y1 = this.y(start[1])
    const x2 = this.x(end[0])
    const y2 = this.y(end[1])
    this.s += <line x1={x1} y1={y1} x2={x2} y2={y2} stroke={this.color(properties)} opacity={this.opacity(properties)} />
    this.extend([x1, x2], [y1, y2])
  }

  drawFilledPolygon(points: readonly Vec3[], properties: Properties) {
    const xs = points.map(([x]) => this.x(x))
    const ys = points.map(([, y]) => this.y(y))
    const s = xs.map((x, i) => `${x},${ys[i]}`).join(' ')
    this.s += <polygon points={s} fill={this.color(properties)} stroke="none" opacity={this.opacity(properties)} />
    this.extend(xs, ys)
  }

  drawText(text: string, [insertX, insertY]: Vec3, properties: TextProperties) {
    const x = this.x(insertX)
    const y = this.y(insertY)
    const h = round(properties.height, this.options.precision)
    const contents = parseDxfTextContent(text)
    const centered = properties.align === 'MIDDLE_CENTER'
    this.s += (
      <text
        x={x}
        y={y}
        fill={this.color(properties)}
        opacity={this.opacity(properties)}
        font-size={h}
        dominant-baseline={centered ? 'central' : undefined}
        text-anchor={centered ? 'middle' : undefined}
        transform={rotate(-properties.rotation, x, y)}
        text-decoration={contents.length === 1 && TEXT_textDecorations(contents[0])}
      >
        {contents.length === 1
          ? escapeHtml(contents[0].text)
          : contents.map(content => <tspan text-decoration={TEXT_textDecorations(content)}>{escapeHtml(content.text)}</tspan>)}
      </text>
    )
    const w = h * contents.reduce((length, content) => length + content.text.length, 0)
    this.extend(centered ? [x - w / 2, x + w / 2] : [x, x + w], centered ? [y - h / 2, y + h / 2] : [y - h, y])
  }

  // POINT entities have no visible geometry
  drawPoint() {}

  result(): readonly [string, ViewBox] {
    if (this.minX > this.maxX) {
      return [this.s, { x: 0, y: 0, w: 0, h: 0 }]
    }
    return [this.s, { x: this.minX, y: this.minY, w: this.maxX - this.minX, h: this.maxY - this.minY }]
  }
}

const resolveOptions = (doc: Document, options: Partial<CreateSvgStringOptions> | undefined): CreateSvgStringOptions => ({
  warn: doc.warn,
  resolveColorIndex: colorIndex => DXF_COLOR_HEX[colorIndex] ?? '#888',
  precision: Number(doc.header.get('$LUPREC') ?? 4),
  ...options,
})

export const createSvgContents = (doc: Document, options?: Partial<CreateSvgStringOptions>) => {
  const resolvedOptions = resolveOptions(doc, options)
  const backend = new SvgBackend(resolvedOptions)
  drawEntities(doc, doc.modelspace, backend, resolvedOptions)
  return backend.result()
}

export const createSvgString = (doc: Document, options?: Partial<CreateSvgStringOptions>) => {
  const [s, { x, y, w, h }] = createSvgContents(doc, options)
  return (
    <svg xmlns="http://www.w3.org/2000/svg" viewBox={`${x} ${y} ${w} ${h}`} width={w} height={h} stroke-width="0.5">
      {s}
    </svg>
  )
}
