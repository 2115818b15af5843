import type { Logger } from './logger'
import type { Box, GroupShape, Presentation, Shape, Slide, StyledRun, TableShape, TextContainer, TextShape } from './types'
import { LINE_BREAK } from './markup'
import { EMU_PER_INCH, EMU_PER_POINT } from './pptx-document'

// Estimator constants. These are heuristics, not typographic measurements.
export const WIDE_GLYPH_FACTOR = 1.0
export const NARROW_GLYPH_FACTOR = 0.55
export const LINE_HEIGHT_FACTOR = 1.2
/** Share of the box width a wrapped line is assumed to fill */
export const WRAP_SAFETY = 0.95
export const FIT_SAFETY = 0.95
export const NOMINAL_FONT_SIZE_PT = 18
export const MIN_FONT_SIZE_PT = 6
/** Gap kept between a widened box and the shape that blocks it (0.1") */
export const WIDEN_MARGIN = EMU_PER_INCH / 10

export interface ReflowStats {
  widened: number
  shrunk: number
  skipped: number
}

function sizeOf(run: StyledRun): number {
  return run.fontSizePt ?? NOMINAL_FONT_SIZE_PT
}

/**
 * Estimated advance of one character in EMU: CJK and other code points
 * above 255 count as full-width, everything else as narrow
 */
export function charWidth(char: string, fontSizePt: number): number {
  const codePoint = char.codePointAt(0) ?? 0
  const factor = codePoint > 255 ? WIDE_GLYPH_FACTOR : NARROW_GLYPH_FACTOR
  return fontSizePt * EMU_PER_POINT * factor
}

/**
 * Unwrapped width of each line of a paragraph, split at hard line breaks
 */
export function estimateLineWidths(runs: StyledRun[]): number[] {
  const widths: number[] = []
  let current = 0
  for (const run of runs) {
    const size = sizeOf(run)
    for (const char of run.text) {
      if (char === LINE_BREAK) {
        widths.push(current)
        current = 0
      }
      else {
        current += charWidth(char, size)
      }
    }
  }
  widths.push(current)
  return widths
}

export function estimateRunsWidth(runs: StyledRun[]): number {
  return estimateLineWidths(runs).reduce((total, width) => total + width, 0)
}

/**
 * Wrapped line count of a paragraph in a box of the given width. An empty
 * line still takes one line.
 */
export function estimateParagraphLines(runs: StyledRun[], availableWidth: number): number {
  const usable = availableWidth * WRAP_SAFETY
  return estimateLineWidths(runs)
    .reduce((lines, width) => lines + Math.max(1, Math.ceil(width / usable)), 0)
}

export function maxFontSize(container: TextContainer): number {
  let max = 0
  for (const paragraph of container.paragraphs) {
    for (const run of paragraph.runs) max = Math.max(max, sizeOf(run))
  }
  return max > 0 ? max : NOMINAL_FONT_SIZE_PT
}

/**
 * Estimated rendered height of a text frame at its own width, in EMU
 */
export function estimateTextHeight(container: TextContainer): number {
  const lines = container.paragraphs
    .reduce((total, paragraph) => total + estimateParagraphLines(paragraph.runs, container.width), 0)
  const lineHeight = maxFontSize(container) * LINE_HEIGHT_FACTOR * EMU_PER_POINT
  return lines * lineHeight
}

/**
 * Uniform font scale that brings the estimated height back inside the box,
 * or null when the text already fits or the box has no usable size.
 *
 * Height grows with the square of the font scale (taller lines and more of
 * them), hence the square root.
 */
export function fitScale(container: TextContainer): number | null {
  if (container.width <= 0 || container.height <= 0) return null
  const estimated = estimateTextHeight(container)
  if (estimated <= container.height) return null
  return Math.sqrt(container.height / estimated) * FIT_SAFETY
}

export function scaledSize(fontSizePt: number | null, scale: number): number {
  const scaled = Math.max(MIN_FONT_SIZE_PT, (fontSizePt ?? NOMINAL_FONT_SIZE_PT) * scale)
  return Math.round(scaled * 100) / 100
}

/**
 * Multiply every run's size by `scale` (6pt floor). Runs without an explicit
 * size are scaled from the nominal size.
 */
export function scaleContainer(container: TextContainer, scale: number): void {
  for (const paragraph of container.paragraphs) {
    if (paragraph.runs.length === 0) continue
    for (const run of paragraph.runs) run.fontSizePt = scaledSize(run.fontSizePt, scale)
    paragraph.modified = true
  }
}

/**
 * Width ratio used to shrink table and group text right after translation,
 * capped at 1 so text never grows
 */
export function shrinkRatio(original: StyledRun[], translated: StyledRun[]): number {
  const before = estimateRunsWidth(original)
  const after = estimateRunsWidth(translated)
  if (before <= 0 || after <= 0) return 1
  return Math.min(1, before / after)
}

function verticallyOverlaps(a: Box, b: Box): boolean {
  return b.top < a.top + a.height && b.top + b.height > a.top
}

/**
 * Right edge the shape may grow to: the nearest sibling that starts at or
 * beyond its right edge on the same horizontal band, else the slide edge
 */
export function widenLimit(shape: Box, siblings: Box[], slideWidth: number): number {
  const right = shape.left + shape.width
  let limit = slideWidth
  for (const other of siblings) {
    if (other === shape) continue
    if (other.left >= right && verticallyOverlaps(shape, other)) {
      limit = Math.min(limit, other.left)
    }
  }
  return limit
}

/**
 * Widen a top-level text box into free space on its right. Never shrinks.
 */
export function widenShape(shape: TextShape, siblings: Box[], slideWidth: number): boolean {
  const candidate = widenLimit(shape, siblings, slideWidth) - shape.left - WIDEN_MARGIN
  if (candidate <= shape.width) return false
  shape.width = candidate
  shape.text.width = candidate
  shape.text.wordWrap = true
  return true
}

/**
 * Shrink a text frame's fonts until its estimated height fits
 */
export function fitTextContainer(container: TextContainer): 'shrunk' | 'fits' | 'skipped' {
  if (container.paragraphs.every(paragraph => paragraph.runs.length === 0)) return 'fits'
  if (container.width <= 0 || container.height <= 0) return 'skipped'

  const scale = fitScale(container)
  if (scale === null) return 'fits'
  scaleContainer(container, scale)
  // The estimate assumes wrapped lines
  container.wordWrap = true
  return 'shrunk'
}

export class LayoutReflow {
  private readonly stats: ReflowStats = { widened: 0, shrunk: 0, skipped: 0 }

  constructor(
    private readonly presentation: Presentation,
    private readonly logger?: Logger,
  ) {}

  /**
   * Widen and refit every text frame of the deck
   */
  adjust(): ReflowStats {
    this.presentation.slides.forEach((slide, index) => {
      this.adjustSlide(slide, index)
    })
    return { ...this.stats }
  }

  private adjustSlide(slide: Slide, index: number): void {
    for (const shape of slide.shapes) {
      this.adjustShape(shape, slide.shapes, index, true)
    }
  }

  private adjustShape(shape: Shape, siblings: Shape[], slideIndex: number, topLevel: boolean): void {
    switch (shape.kind) {
      case 'text':
        this.adjustTextShape(shape, siblings, slideIndex, topLevel)
        break
      case 'table':
        this.adjustTable(shape, slideIndex)
        break
      case 'group':
        this.adjustGroup(shape, slideIndex)
        break
      case 'graphic':
        break
    }
  }

  private adjustTextShape(shape: TextShape, siblings: Shape[], slideIndex: number, topLevel: boolean): void {
    if (shape.text.paragraphs.length === 0) return

    if (topLevel && shape.width > 0 && shape.height > 0
      && widenShape(shape, siblings, this.presentation.slideWidth)) {
      this.stats.widened++
    }
    this.fit(shape.text, `slide ${slideIndex + 1} "${shape.name}"`)
  }

  private adjustTable(table: TableShape, slideIndex: number): void {
    for (const cell of table.cells) {
      this.fit(cell.text, `slide ${slideIndex + 1} "${table.name}" cell ${cell.row + 1},${cell.col + 1}`)
    }
  }

  private adjustGroup(group: GroupShape, slideIndex: number): void {
    for (const child of group.children) {
      this.adjustShape(child, group.children, slideIndex, false)
    }
  }

  private fit(container: TextContainer, label: string): void {
    const outcome = fitTextContainer(container)
    if (outcome === 'shrunk') {
      this.stats.shrunk++
    }
    else if (outcome === 'skipped') {
      this.stats.skipped++
      this.logger?.log(`Skipped fitting ${label}: box has no usable size`, 'dim')
    }
  }
}
