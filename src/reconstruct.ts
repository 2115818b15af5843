import type { Paragraph, StyledRun, TextContext } from './types'
import { scaledSize, shrinkRatio } from './layout'
import { mergeRuns, plainText } from './markup'

/**
 * Swap a paragraph's runs for the decoded translation. Returns false (and
 * leaves the original runs in place) when the translation decoded to nothing.
 *
 * Constrained text (tables, groups) cannot be widened later, so it is shrunk
 * right away by the ratio of estimated original to translated width. Runs
 * that inherit their size keep inheriting it; the reflow pass fits those.
 */
export function reconstructParagraph(
  paragraph: Paragraph,
  decoded: StyledRun[],
  context: TextContext,
): boolean {
  if (decoded.length === 0 || plainText(decoded).trim().length === 0) return false

  let runs = mergeRuns(decoded)
  if (context === 'constrained') {
    const ratio = shrinkRatio(paragraph.runs, runs)
    if (ratio < 1) {
      runs = runs.map(run => run.fontSizePt === null
        ? run
        : { ...run, fontSizePt: scaledSize(run.fontSizePt, ratio) })
    }
  }

  paragraph.runs = runs
  paragraph.modified = true
  return true
}
