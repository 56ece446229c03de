import { escapeHtml } from './util'

const flatten = (children: readonly unknown[]): string =>
  children.map(child => (Array.isArray(child) ? flatten(child) : typeof child === 'string' || typeof child === 'number' ? String(child) : '')).join('')

export const jsx = (type: string, props: Record<string, unknown> | null, ...children: unknown[]) => {
  let s = '<' + type
  for (const [key, value] of Object.entries(props ?? {})) {
    if (!value) {
      continue
    }
    s += ` ${key}="${typeof value === 'string' ? escapeHtml(value) : String(value)}"`
  }
  if (type === 'line') {
    s += ' vector-effect="non-scaling-stroke"'
  }
  if (type === 'text') {
    s += ' stroke="none" white-space="pre"'
  }
  const content = flatten(children)
  return content ? `${s}>${content}</${type}>` : s + '/>'
}
