import { describe, expect, it } from 'vitest'
import { ValidationError } from './errors'
import { formatText, suppressZeros } from './formatText'

describe('formatText', () => {
  it('formats with a fixed count of decimal places', () => {
    expect(formatText(12, { dimdec: 2 })).toBe('12.00')
  })

  it('removes trailing zeros if decimal places are unset', () => {
    expect(formatText(0.5, { dimzin: 4 })).toBe('.5')
    expect(formatText(1 / 3)).toBe('0.333333')
  })

  it('suppresses trailing zeros and fills the template', () => {
    expect(formatText(3, { dimdec: 0, dimzin: 8, dimpost: '<>mm' })).toBe('3mm')
    expect(formatText(10, { dimdec: 1, dimpost: 'L=<> mm' })).toBe('L=10.0 mm')
  })

  it('rounds to a multiple of dimrnd', () => {
    expect(formatText(12.34, { dimrnd: 0.25, dimdec: 2 })).toBe('12.25')
    expect(formatText(2.5, { dimrnd: 1, dimdec: 0 })).toBe('3')
    expect(formatText(-2.5, { dimrnd: 1, dimdec: 0 })).toBe('-3')
  })

  it('replaces the decimal separator', () => {
    expect(formatText(1.5, { dimdec: 2, dimdsep: ',' })).toBe('1,50')
  })

  it('returns the plain number for an empty template', () => {
    expect(formatText(7.25, { dimdec: 2, dimpost: '' })).toBe('7.25')
  })

  it('rejects a template without placeholder', () => {
    expect(() => formatText(1, { dimpost: 'mm' })).toThrow(ValidationError)
  })

  it('keeps the sign when leading zeros are suppressed', () => {
    expect(formatText(-0.25, { dimdec: 2, dimzin: 4 })).toBe('-.25')
  })

  it('formats zero as 0 if zeros are suppressed', () => {
    expect(formatText(0, { dimdec: 3, dimzin: 12 })).toBe('0')
  })

  it('raises decimal places', () => {
    expect(formatText(1.25, { dimdec: 2, raiseDecimals: true })).toBe('1{\\H0.7x;\\S25^ ;}')
  })
})

describe('suppressZeros', () => {
  it('strips trailing zeros and a dangling decimal point', () => {
    expect(suppressZeros('1.500')).toBe('1.5')
    expect(suppressZeros('2.000')).toBe('2')
  })

  it('strips leading zeros', () => {
    expect(suppressZeros('0.50', true, false)).toBe('.50')
  })

  it('returns the text unchanged without suppression', () => {
    expect(suppressZeros('0.50', false, false)).toBe('0.50')
  })
})
