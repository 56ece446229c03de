export type JSXElement<T extends string> = { readonly [K in T]?: string | number }

declare global {
  namespace JSX {
    type Element = string

    interface IntrinsicElements {
      svg: JSXElement<'xmlns' | 'viewBox' | 'width' | 'height'>
      line: JSXElement<'x1' | 'y1' | 'x2' | 'y2' | 'stroke' | 'opacity'>
      polygon: JSXElement<'points' | 'stroke' | 'fill' | 'opacity'>
      text: JSXElement<'x' | 'y' | 'fill' | 'transform' | 'opacity'>
      tspan: JSXElement<'dx' | 'dy'>
    }
  }
}
