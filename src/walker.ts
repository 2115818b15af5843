import type { Shape, TaskSeed, TextContainer, TextContext } from './types'
import { encodeRuns, plainText } from './markup'

/**
 * Translatable paragraphs of a text frame. Paragraphs that are blank after
 * trimming stay in the document but produce no seed.
 */
export function walkTextContainer(container: TextContainer, context: TextContext): TaskSeed[] {
  const seeds: TaskSeed[] = []
  for (const paragraph of container.paragraphs) {
    const raw = plainText(paragraph.runs)
    if (raw.trim().length === 0) continue

    seeds.push({
      paragraph,
      markup: encodeRuns(paragraph.runs),
      rawLength: raw.length,
      context,
    })
  }
  return seeds
}

/**
 * Collect seeds from a shape. Anything nested in a group or a table is
 * `constrained`, whatever context it was reached with.
 */
export function walkShape(shape: Shape, context: TextContext = 'standard'): TaskSeed[] {
  switch (shape.kind) {
    case 'group':
      return shape.children.flatMap(child => walkShape(child, 'constrained'))
    case 'table':
      return shape.cells.flatMap(cell => walkTextContainer(cell.text, 'constrained'))
    case 'text':
      return walkTextContainer(shape.text, context)
    case 'graphic':
      return []
  }
}

export function walkShapes(shapes: Shape[]): TaskSeed[] {
  return shapes.flatMap(shape => walkShape(shape))
}
