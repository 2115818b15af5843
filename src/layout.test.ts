import type { GroupShape, Presentation, TableShape } from './types'
import { describe, expect, it } from 'vitest'
import {
  charWidth,
  estimateLineWidths,
  estimateParagraphLines,
  fitScale,
  fitTextContainer,
  LayoutReflow,
  shrinkRatio,
  WIDEN_MARGIN,
  widenLimit,
  widenShape,
} from './layout'
import { LINE_BREAK } from './markup'
import { container, paragraph, run, textShape } from './test-utils'

const SLIDE_WIDTH = 9144000

// 700 narrow characters at 12pt wrap to 10 lines in a 500pt (6,350,000 EMU) box
const longText = () => paragraph(run('A'.repeat(700), { fontSizePt: 12 }))

describe('estimates', () => {
  it('counts code points above 255 as full width', () => {
    expect(charWidth('A', 10)).toBeCloseTo(69850, 6)
    expect(charWidth('あ', 10)).toBe(127000)
  })

  it('splits lines at hard breaks', () => {
    const [first, second, ...rest] = estimateLineWidths([run(`AB${LINE_BREAK}C`, { fontSizePt: 10 })])
    expect(first).toBeCloseTo(139700, 6)
    expect(second).toBeCloseTo(69850, 6)
    expect(rest).toEqual([])
  })

  it('gives every line, even an empty one, at least one wrapped line', () => {
    expect(estimateParagraphLines([], 1000)).toBe(1)
    expect(estimateParagraphLines([run(LINE_BREAK)], 1000)).toBe(2)
    expect(estimateParagraphLines(longText().runs, 6350000)).toBe(10)
  })

  it('shrink ratio never grows the text', () => {
    expect(shrinkRatio([run('Hi', { fontSizePt: 20 })], [run('Hiiii', { fontSizePt: 20 })])).toBeCloseTo(0.4, 10)
    expect(shrinkRatio([run('Hello')], [run('Hi')])).toBe(1)
  })
})

describe('widening', () => {
  const shapeBox = { left: 0, top: 0, width: 1000000, height: 500000 }

  it('grows up to the slide edge minus the margin', () => {
    const shape = textShape(shapeBox, [paragraph(run('x'))])
    expect(widenShape(shape, [shape], SLIDE_WIDTH)).toBe(true)
    expect(shape.width).toBe(SLIDE_WIDTH - WIDEN_MARGIN)
    expect(shape.text.width).toBe(shape.width)
  })

  it('stops at the nearest shape to the right on the same band', () => {
    const blocker = { left: 3000000, top: 100000, width: 500000, height: 500000 }
    const far = { left: 5000000, top: 0, width: 500000, height: 500000 }
    expect(widenLimit(shapeBox, [far, blocker], SLIDE_WIDTH)).toBe(3000000)
  })

  it('ignores shapes above, below or to the left', () => {
    const below = { left: 3000000, top: 500000, width: 500000, height: 500000 }
    const left = { left: 0, top: 0, width: 0, height: 500000 }
    expect(widenLimit(shapeBox, [below, left], SLIDE_WIDTH)).toBe(SLIDE_WIDTH)
  })

  it('never shrinks a box that already reaches its limit', () => {
    const shape = textShape({ ...shapeBox, width: 2950000 }, [paragraph(run('x'))])
    const blocker = { left: 3000000, top: 0, width: 500000, height: 500000 }
    expect(widenShape(shape, [shape, blocker], SLIDE_WIDTH)).toBe(false)
    expect(shape.width).toBe(2950000)
  })
})

describe('font fitting', () => {
  it('leaves text that fits alone', () => {
    const text = container([longText()], 6350000, 2000000)
    expect(fitScale(text)).toBeNull()
    expect(fitTextContainer(text)).toBe('fits')
    expect(text.paragraphs[0]?.runs[0]?.fontSizePt).toBe(12)
  })

  it('scales by the square root of the overflow, with a safety factor', () => {
    // 10 lines x 14.4pt = 1,828,800 EMU against 914,400: half the height
    const text = container([longText()], 6350000, 914400)
    expect(fitScale(text)).toBeCloseTo(Math.sqrt(0.5) * 0.95, 10)
    expect(fitTextContainer(text)).toBe('shrunk')
    expect(text.paragraphs[0]?.runs[0]?.fontSizePt).toBe(8.06)
    expect(text.paragraphs[0]?.modified).toBe(true)

    // Once shrunk, the estimate fits and a second pass changes nothing
    expect(fitScale(text)).toBeNull()
  })

  it('turns wrapping on only for frames it shrinks', () => {
    const fits = { ...container([longText()], 6350000, 2000000), wordWrap: false }
    fitTextContainer(fits)
    expect(fits.wordWrap).toBe(false)

    const overflowing = { ...container([longText()], 6350000, 914400), wordWrap: false }
    fitTextContainer(overflowing)
    expect(overflowing.wordWrap).toBe(true)
  })

  it('never goes below 6pt', () => {
    const text = container([longText()], 6350000, 457200)
    expect(fitScale(text)).toBeCloseTo(0.475, 10)
    fitTextContainer(text)
    expect(text.paragraphs[0]?.runs[0]?.fontSizePt).toBe(6)
  })

  it('skips frames without a usable size', () => {
    expect(fitTextContainer(container([longText()], 0, 0))).toBe('skipped')
    expect(fitTextContainer(container([paragraph()], 0, 0))).toBe('fits')
  })
})

describe('LayoutReflow', () => {
  it('widens top-level boxes, fits cells and group members', () => {
    const title = textShape({ left: 0, top: 0, width: 3000000, height: 457200 }, [longText()], 'Title')
    const table: TableShape = {
      kind: 'table',
      id: '3',
      name: 'Table',
      left: 0,
      top: 2000000,
      width: 1000000,
      height: 300000,
      cells: [{ row: 0, col: 0, text: container([paragraph(run('Cell', { fontSizePt: 10 }))], 1000000, 300000) }],
    }
    const member = textShape({ left: 0, top: 0, width: 0, height: 0 }, [paragraph(run('Member'))], 'Member')
    const group: GroupShape = {
      kind: 'group',
      id: '4',
      name: 'Group',
      left: 0,
      top: 4000000,
      width: 1000000,
      height: 1000000,
      children: [member],
    }
    const presentation: Presentation = {
      slides: [{ path: 'ppt/slides/slide1.xml', shapes: [title, table, group] }],
      slideWidth: SLIDE_WIDTH,
      slideHeight: 6858000,
    }

    const stats = new LayoutReflow(presentation).adjust()

    expect(stats).toEqual({ widened: 1, shrunk: 1, skipped: 1 })
    expect(title.width).toBe(SLIDE_WIDTH - WIDEN_MARGIN)
    // 7 lines at the new width; sqrt(5/14) * 0.95 * 12pt
    expect(title.text.paragraphs[0]?.runs[0]?.fontSizePt).toBe(6.81)
    expect(table.cells[0]?.text.paragraphs[0]?.runs[0]?.fontSizePt).toBe(10)
    expect(member.width).toBe(0)
  })
})
