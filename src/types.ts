/**
 * A literal RGB color, stored as six uppercase hex digits without the leading `#`
 */
export interface RgbColor {
  kind: 'rgb'
  hex: string
}

/**
 * A reference into the deck's color scheme
 */
export interface ThemeColor {
  kind: 'theme'
  /** Numeric scheme slot (see `THEME_COLOR_IDS` in pptx-document) */
  themeId: number
  /** Tint (positive) or shade (negative) in the range -1..1 */
  brightness: number | null
}

export type RunColor = RgbColor | ThemeColor

/**
 * A maximal span of text sharing one style
 */
export interface StyledRun {
  text: string
  bold: boolean
  italic: boolean
  underline: boolean
  strike: boolean
  fontSizePt: number | null
  color: RunColor | null
}

export type RunStyle = Omit<StyledRun, 'text'>

/**
 * A paragraph inside a text frame. The run list is replaced wholesale on
 * reconstruction; `modified` tells the writer to rebuild it in the XML.
 */
export interface Paragraph {
  runs: StyledRun[]
  modified: boolean
}

/**
 * Text frame of a shape or of a table cell. Width and height are in EMU.
 */
export interface TextContainer {
  paragraphs: Paragraph[]
  width: number
  height: number
  /** False while the frame is set not to wrap (`wrap="none"`) */
  wordWrap: boolean
}

export interface Box {
  left: number
  top: number
  width: number
  height: number
}

export interface TextShape extends Box {
  kind: 'text'
  id: string
  name: string
  text: TextContainer
}

export interface TableCell {
  row: number
  col: number
  text: TextContainer
}

export interface TableShape extends Box {
  kind: 'table'
  id: string
  name: string
  cells: TableCell[]
}

/**
 * Children keep their own (group-local) coordinates
 */
export interface GroupShape extends Box {
  kind: 'group'
  id: string
  name: string
  children: Shape[]
}

/**
 * Pictures, charts, connectors: no text, but they still block widening
 */
export interface GraphicShape extends Box {
  kind: 'graphic'
  id: string
  name: string
}

export type Shape = TextShape | TableShape | GroupShape | GraphicShape

export interface Slide {
  /** Package path, e.g. "ppt/slides/slide3.xml" */
  path: string
  shapes: Shape[]
}

export interface Presentation {
  slides: Slide[]
  slideWidth: number
  slideHeight: number
}

/**
 * `standard` text may be widened during reflow; `constrained` text (table
 * cells, group members) can only shrink its font.
 */
export type TextContext = 'standard' | 'constrained'

/**
 * A paragraph found by the walker, ready to become a translation task
 */
export interface TaskSeed {
  paragraph: Paragraph
  markup: string
  rawLength: number
  context: TextContext
}

export interface TranslationTask {
  paragraph: Paragraph
  encodedMarkup: string
  maxChars: number
  context: TextContext
}

export interface BatchItem {
  /** Batch-local, 0-based */
  id: number
  text: string
  limit: number
}

export interface BatchResult {
  id: number
  translation: string
}
