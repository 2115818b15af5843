import type { PackageFiles } from './pptx-utils'
import type {
  Box,
  Paragraph,
  Presentation,
  RunColor,
  RunStyle,
  Shape,
  Slide,
  StyledRun,
  TableCell,
  TextContainer,
  TextShape,
} from './types'
import { LINE_BREAK } from './markup'
import {
  createPptx,
  extractPptx,
  getXmlContent,
  hasFile,
  relsPathFor,
  resolveTarget,
  setXmlContent,
} from './pptx-utils'
import {
  childElements,
  cloneElement,
  findPath,
  firstChild,
  intAttr,
  NS_A,
  parseXml,
  removeChildren,
  serializeXml,
} from './xml-utils'

export const EMU_PER_INCH = 914400
export const EMU_PER_POINT = 12700

// 4:3 default used by PowerPoint when p:sldSz is missing
const DEFAULT_SLIDE_WIDTH = 9144000
const DEFAULT_SLIDE_HEIGHT = 6858000

/**
 * Scheme color names and their numeric slots
 */
export const THEME_COLOR_IDS: Record<string, number> = {
  dk1: 1,
  lt1: 2,
  dk2: 3,
  lt2: 4,
  accent1: 5,
  accent2: 6,
  accent3: 7,
  accent4: 8,
  accent5: 9,
  accent6: 10,
  hlink: 11,
  folHlink: 12,
  tx1: 13,
  bg1: 14,
  tx2: 15,
  bg2: 16,
}

const RUN_ELEMENTS = ['a:r', 'a:br', 'a:fld']
const FILL_ELEMENTS = ['a:noFill', 'a:solidFill', 'a:gradFill', 'a:blipFill', 'a:pattFill', 'a:grpFill']
const SHAPE_ELEMENTS = ['p:sp', 'p:grpSp', 'p:graphicFrame', 'p:pic', 'p:cxnSp']

interface ParagraphBinding {
  element: Element
  /** The run array as last written; a different array means the runs were replaced */
  sourceRuns: StyledRun[]
  /** Elements (`a:r`, `a:br`, `a:fld`) written for each entry of `sourceRuns` */
  runElements: Element[][]
  runProps: (Element | null)[]
}

interface TextShapeBinding {
  element: Element
  width: number
  hasOwnGeometry: boolean
}

interface PlaceholderGeometry {
  idx: string | null
  type: string
  box: Box
}

function isTrue(value: string | null): boolean {
  return value === '1' || value === 'true'
}

function themeNameFor(themeId: number): string | null {
  return Object.entries(THEME_COLOR_IDS).find(([, id]) => id === themeId)?.[0] ?? null
}

function readColor(rPr: Element): RunColor | null {
  const fill = firstChild(rPr, 'a:solidFill')
  if (!fill) return null

  const srgb = firstChild(fill, 'a:srgbClr')
  const srgbValue = srgb?.getAttribute('val')
  if (srgbValue) return { kind: 'rgb', hex: srgbValue.toUpperCase() }

  const scheme = firstChild(fill, 'a:schemeClr')
  const themeId = THEME_COLOR_IDS[scheme?.getAttribute('val') ?? '']
  if (!scheme || themeId === undefined) return null

  const lumMod = intAttr(firstChild(scheme, 'a:lumMod'), 'val')
  const lumOff = intAttr(firstChild(scheme, 'a:lumOff'), 'val')
  let brightness: number | null = null
  if (lumOff !== null) brightness = lumOff / 100000
  else if (lumMod !== null) brightness = lumMod / 100000 - 1

  return { kind: 'theme', themeId, brightness }
}

/**
 * Style carried by an `a:rPr` (or `a:endParaRPr`) element
 */
export function readRunStyle(rPr: Element | null): RunStyle {
  if (!rPr) {
    return { bold: false, italic: false, underline: false, strike: false, fontSizePt: null, color: null }
  }
  const underline = rPr.getAttribute('u')
  const strike = rPr.getAttribute('strike')
  const size = intAttr(rPr, 'sz')
  return {
    bold: isTrue(rPr.getAttribute('b')),
    italic: isTrue(rPr.getAttribute('i')),
    underline: underline !== null && underline !== '' && underline !== 'none',
    strike: strike !== null && strike !== '' && strike !== 'noStrike',
    fontSizePt: size === null ? null : size / 100,
    color: readColor(rPr),
  }
}

function readBox(xfrm: Element | null): Box | null {
  const off = xfrm ? firstChild(xfrm, 'a:off') : null
  const ext = xfrm ? firstChild(xfrm, 'a:ext') : null
  if (!off || !ext) return null
  return {
    left: intAttr(off, 'x') ?? 0,
    top: intAttr(off, 'y') ?? 0,
    width: intAttr(ext, 'cx') ?? 0,
    height: intAttr(ext, 'cy') ?? 0,
  }
}

function xfrmOf(shape: Element): Element | null {
  switch (shape.nodeName) {
    case 'p:graphicFrame':
      return firstChild(shape, 'p:xfrm')
    case 'p:grpSp':
      return findPath(shape, 'p:grpSpPr', 'a:xfrm')
    default:
      return findPath(shape, 'p:spPr', 'a:xfrm')
  }
}

function identityOf(shape: Element): { id: string, name: string } {
  const nv = childElements(shape).find(child => child.nodeName.startsWith('p:nv'))
  const cNvPr = nv ? firstChild(nv, 'p:cNvPr') : null
  return {
    id: cNvPr?.getAttribute('id') ?? '',
    name: cNvPr?.getAttribute('name') ?? '',
  }
}

function placeholderOf(sp: Element): { idx: string | null, type: string } | null {
  const ph = findPath(sp, 'p:nvSpPr', 'p:nvPr', 'p:ph')
  if (!ph) return null
  return {
    idx: ph.getAttribute('idx') || null,
    type: ph.getAttribute('type') || 'body',
  }
}

// Layout placeholder types fall back to the master's generic ones
const MASTER_PLACEHOLDER_TYPE: Record<string, string> = {
  ctrTitle: 'title',
  subTitle: 'body',
  obj: 'body',
}

function matchPlaceholder(
  candidates: PlaceholderGeometry[],
  wanted: { idx: string | null, type: string },
): Box | null {
  if (wanted.idx !== null) {
    const byIdx = candidates.find(c => c.idx === wanted.idx)
    if (byIdx) return byIdx.box
  }
  const type = wanted.type
  const byType = candidates.find(c => c.type === type)
    ?? candidates.find(c => c.type === (MASTER_PLACEHOLDER_TYPE[type] ?? type))
  return byType?.box ?? null
}

/**
 * A parsed .pptx package. `presentation` is the editable model; `write()`
 * pushes changed paragraphs and resized shapes back into the XML parts.
 */
export class PptxDocument {
  readonly presentation: Presentation

  private readonly files: PackageFiles
  private readonly slideDocs = new Map<Slide, Document>()
  private readonly paragraphBindings = new Map<Paragraph, ParagraphBinding>()
  private readonly textShapeBindings = new Map<TextShape, TextShapeBinding>()
  private readonly bodyPropsBindings = new Map<TextContainer, Element>()
  private readonly placeholderCache = new Map<string, PlaceholderGeometry[]>()

  private constructor(files: PackageFiles) {
    this.files = files
    const presentationXml = parseXml(getXmlContent(files, 'ppt/presentation.xml')).documentElement
    const sldSz = firstChild(presentationXml, 'p:sldSz')

    const slides: Slide[] = []
    for (const path of this.slidePaths(presentationXml)) {
      const doc = parseXml(getXmlContent(files, path))
      const slide: Slide = { path, shapes: this.readSlideShapes(doc, path) }
      this.slideDocs.set(slide, doc)
      slides.push(slide)
    }

    this.presentation = {
      slides,
      slideWidth: intAttr(sldSz, 'cx') ?? DEFAULT_SLIDE_WIDTH,
      slideHeight: intAttr(sldSz, 'cy') ?? DEFAULT_SLIDE_HEIGHT,
    }
  }

  /**
   * Parse an already-unzipped package
   */
  static fromFiles(files: PackageFiles): PptxDocument {
    return new PptxDocument(files)
  }

  static async open(path: string): Promise<PptxDocument> {
    return new PptxDocument(await extractPptx(path))
  }

  async save(path: string): Promise<void> {
    await createPptx(this.write(), path)
  }

  /**
   * Serialize every slide back into the package and return its files
   */
  write(): PackageFiles {
    for (const [paragraph, binding] of this.paragraphBindings) {
      if (!paragraph.modified) continue
      this.writeParagraph(paragraph, binding)
      paragraph.modified = false
    }
    for (const [shape, binding] of this.textShapeBindings) {
      if (shape.width === binding.width) continue
      this.writeShapeWidth(shape, binding)
      binding.width = shape.width
      binding.hasOwnGeometry = true
    }
    for (const [container, bodyPr] of this.bodyPropsBindings) {
      if (container.wordWrap && bodyPr.getAttribute('wrap') === 'none') bodyPr.setAttribute('wrap', 'square')
    }
    for (const [slide, doc] of this.slideDocs) {
      setXmlContent(this.files, slide.path, serializeXml(doc))
    }
    return this.files
  }

  // Relationship id -> resolved part path, for the given part
  private relationships(partPath: string): Map<string, { target: string, type: string }> {
    const rels = new Map<string, { target: string, type: string }>()
    const relsPath = relsPathFor(partPath)
    if (!hasFile(this.files, relsPath)) return rels

    const root = parseXml(getXmlContent(this.files, relsPath)).documentElement
    for (const rel of childElements(root, 'Relationship')) {
      const id = rel.getAttribute('Id')
      const target = rel.getAttribute('Target')
      if (!id || !target || rel.getAttribute('TargetMode') === 'External') continue
      rels.set(id, { target: resolveTarget(partPath, target), type: rel.getAttribute('Type') ?? '' })
    }
    return rels
  }

  private slidePaths(presentationXml: Element): string[] {
    const rels = this.relationships('ppt/presentation.xml')
    const sldIdLst = firstChild(presentationXml, 'p:sldIdLst')
    if (!sldIdLst) return []

    return childElements(sldIdLst, 'p:sldId')
      .map(sldId => rels.get(sldId.getAttribute('r:id') ?? '')?.target)
      .filter((path): path is string => path !== undefined && hasFile(this.files, path))
  }

  private relatedPart(partPath: string, typeSuffix: string): string | null {
    for (const rel of this.relationships(partPath).values()) {
      if (rel.type.endsWith(typeSuffix) && hasFile(this.files, rel.target)) return rel.target
    }
    return null
  }

  private placeholders(partPath: string): PlaceholderGeometry[] {
    const cached = this.placeholderCache.get(partPath)
    if (cached) return cached

    const root = parseXml(getXmlContent(this.files, partPath)).documentElement
    const spTree = findPath(root, 'p:cSld', 'p:spTree')
    const found: PlaceholderGeometry[] = []
    for (const sp of spTree ? childElements(spTree, 'p:sp') : []) {
      const ph = placeholderOf(sp)
      const box = readBox(xfrmOf(sp))
      if (ph && box) found.push({ ...ph, box })
    }
    this.placeholderCache.set(partPath, found)
    return found
  }

  /**
   * Geometry a placeholder inherits from its layout, then from the master
   */
  private inheritedBox(slidePath: string, sp: Element): Box | null {
    const ph = placeholderOf(sp)
    if (!ph) return null

    const layout = this.relatedPart(slidePath, '/slideLayout')
    if (!layout) return null
    const fromLayout = matchPlaceholder(this.placeholders(layout), ph)
    if (fromLayout) return fromLayout

    const master = this.relatedPart(layout, '/slideMaster')
    return master ? matchPlaceholder(this.placeholders(master), ph) : null
  }

  private readSlideShapes(doc: Document, slidePath: string): Shape[] {
    const spTree = findPath(doc.documentElement, 'p:cSld', 'p:spTree')
    return spTree ? this.readShapes(spTree, slidePath) : []
  }

  private readShapes(container: Element, slidePath: string): Shape[] {
    const shapes: Shape[] = []
    for (const el of childElements(container, ...SHAPE_ELEMENTS)) {
      const shape = this.readShape(el, slidePath)
      if (shape) shapes.push(shape)
    }
    return shapes
  }

  private readShape(el: Element, slidePath: string): Shape | null {
    const { id, name } = identityOf(el)
    const ownBox = readBox(xfrmOf(el))

    switch (el.nodeName) {
      case 'p:grpSp':
        return {
          kind: 'group',
          id,
          name,
          ...(ownBox ?? { left: 0, top: 0, width: 0, height: 0 }),
          children: this.readShapes(el, slidePath),
        }

      case 'p:graphicFrame': {
        const tbl = findPath(el, 'a:graphic', 'a:graphicData', 'a:tbl')
        const box = ownBox ?? { left: 0, top: 0, width: 0, height: 0 }
        if (!tbl) return { kind: 'graphic', id, name, ...box }
        return { kind: 'table', id, name, ...box, cells: this.readTableCells(tbl) }
      }

      case 'p:sp': {
        const box = ownBox ?? this.inheritedBox(slidePath, el) ?? { left: 0, top: 0, width: 0, height: 0 }
        const txBody = firstChild(el, 'p:txBody')
        const shape: TextShape = {
          kind: 'text',
          id,
          name,
          ...box,
          text: this.readTextContainer(txBody, box.width, box.height),
        }
        this.textShapeBindings.set(shape, { element: el, width: box.width, hasOwnGeometry: ownBox !== null })
        return shape
      }

      default:
        return { kind: 'graphic', id, name, ...(ownBox ?? { left: 0, top: 0, width: 0, height: 0 }) }
    }
  }

  private readTableCells(tbl: Element): TableCell[] {
    const columnWidths = childElements(firstChild(tbl, 'a:tblGrid') ?? tbl, 'a:gridCol')
      .map(col => intAttr(col, 'w') ?? 0)
    const rows = childElements(tbl, 'a:tr')
    const rowHeights = rows.map(tr => intAttr(tr, 'h') ?? 0)
    const sum = (values: number[]) => values.reduce((total, v) => total + v, 0)

    const cells: TableCell[] = []
    rows.forEach((tr, row) => {
      childElements(tr, 'a:tc').forEach((tc, col) => {
        // Continuation cells of a merge carry no visible text of their own
        if (isTrue(tc.getAttribute('hMerge')) || isTrue(tc.getAttribute('vMerge'))) return

        const gridSpan = Math.max(1, intAttr(tc, 'gridSpan') ?? 1)
        const rowSpan = Math.max(1, intAttr(tc, 'rowSpan') ?? 1)
        const width = sum(columnWidths.slice(col, col + gridSpan))
        const height = sum(rowHeights.slice(row, row + rowSpan))
        cells.push({ row, col, text: this.readTextContainer(firstChild(tc, 'a:txBody'), width, height) })
      })
    })
    return cells
  }

  private readTextContainer(txBody: Element | null, width: number, height: number): TextContainer {
    const paragraphs = txBody
      ? childElements(txBody, 'a:p').map(p => this.readParagraph(p))
      : []
    const bodyPr = txBody ? firstChild(txBody, 'a:bodyPr') : null
    const container: TextContainer = {
      paragraphs,
      width,
      height,
      wordWrap: bodyPr?.getAttribute('wrap') !== 'none',
    }
    if (bodyPr) this.bodyPropsBindings.set(container, bodyPr)
    return container
  }

  private readParagraph(p: Element): Paragraph {
    const runs: StyledRun[] = []
    const runElements: Element[][] = []
    const runProps: (Element | null)[] = []

    for (const child of childElements(p, ...RUN_ELEMENTS)) {
      const rPr = firstChild(child, 'a:rPr')
      const text = child.nodeName === 'a:br'
        ? LINE_BREAK
        : firstChild(child, 'a:t')?.textContent ?? ''
      runs.push({ text, ...readRunStyle(rPr) })
      runElements.push([child])
      runProps.push(rPr)
    }

    const paragraph: Paragraph = { runs, modified: false }
    this.paragraphBindings.set(paragraph, { element: p, sourceRuns: runs, runElements, runProps })
    return paragraph
  }

  private writeParagraph(paragraph: Paragraph, binding: ParagraphBinding): void {
    if (paragraph.runs === binding.sourceRuns) {
      this.writeRunSizes(paragraph, binding)
      return
    }

    const p = binding.element
    const doc = p.ownerDocument
    const anchor = firstChild(p, 'a:endParaRPr')
    const template = binding.runProps.find(rPr => rPr !== null) ?? null

    removeChildren(p, RUN_ELEMENTS)

    binding.runElements = paragraph.runs.map((run) => {
      const written: Element[] = []
      run.text.split(LINE_BREAK).forEach((piece, pieceIndex) => {
        if (pieceIndex > 0) {
          const br = doc.createElementNS(NS_A, 'a:br')
          br.appendChild(buildRunProps(doc, template, run))
          p.insertBefore(br, anchor)
          written.push(br)
        }
        if (piece.length === 0) return

        const r = doc.createElementNS(NS_A, 'a:r')
        const t = doc.createElementNS(NS_A, 'a:t')
        t.appendChild(doc.createTextNode(piece))
        r.appendChild(buildRunProps(doc, template, run))
        r.appendChild(t)
        p.insertBefore(r, anchor)
        written.push(r)
      })
      return written
    })
    binding.sourceRuns = paragraph.runs
  }

  /**
   * Only font sizes changed: set `sz` on the elements already in place, so
   * fields stay fields and every other property stays as it was
   */
  private writeRunSizes(paragraph: Paragraph, binding: ParagraphBinding): void {
    const doc = binding.element.ownerDocument
    paragraph.runs.forEach((run, index) => {
      for (const element of binding.runElements[index] ?? []) {
        let rPr = firstChild(element, 'a:rPr')
        if (!rPr) {
          if (run.fontSizePt === null) continue
          rPr = doc.createElementNS(NS_A, 'a:rPr')
          element.insertBefore(rPr, element.firstChild)
        }
        if (run.fontSizePt === null) rPr.removeAttribute('sz')
        else rPr.setAttribute('sz', String(Math.round(run.fontSizePt * 100)))
      }
    })
  }

  private writeShapeWidth(shape: TextShape, binding: TextShapeBinding): void {
    const sp = binding.element
    const doc = sp.ownerDocument
    const cx = String(Math.round(shape.width))

    if (binding.hasOwnGeometry) {
      findPath(sp, 'p:spPr', 'a:xfrm', 'a:ext')?.setAttribute('cx', cx)
    }
    else {
      let spPr = firstChild(sp, 'p:spPr')
      if (!spPr) {
        spPr = doc.createElementNS(sp.namespaceURI, 'p:spPr')
        sp.insertBefore(spPr, firstChild(sp, 'p:style') ?? firstChild(sp, 'p:txBody'))
      }
      const xfrm = doc.createElementNS(NS_A, 'a:xfrm')
      const off = doc.createElementNS(NS_A, 'a:off')
      off.setAttribute('x', String(Math.round(shape.left)))
      off.setAttribute('y', String(Math.round(shape.top)))
      const ext = doc.createElementNS(NS_A, 'a:ext')
      ext.setAttribute('cx', cx)
      ext.setAttribute('cy', String(Math.round(shape.height)))
      xfrm.appendChild(off)
      xfrm.appendChild(ext)
      spPr.insertBefore(xfrm, spPr.firstChild)
    }

  }
}

function buildColor(doc: Document, color: RunColor): Element {
  const fill = doc.createElementNS(NS_A, 'a:solidFill')
  if (color.kind === 'rgb') {
    const srgb = doc.createElementNS(NS_A, 'a:srgbClr')
    srgb.setAttribute('val', color.hex)
    fill.appendChild(srgb)
    return fill
  }

  const scheme = doc.createElementNS(NS_A, 'a:schemeClr')
  scheme.setAttribute('val', themeNameFor(color.themeId) ?? 'tx1')
  const brightness = color.brightness ?? 0
  if (brightness > 0) {
    const lumMod = doc.createElementNS(NS_A, 'a:lumMod')
    lumMod.setAttribute('val', String(Math.round((1 - brightness) * 100000)))
    const lumOff = doc.createElementNS(NS_A, 'a:lumOff')
    lumOff.setAttribute('val', String(Math.round(brightness * 100000)))
    scheme.appendChild(lumMod)
    scheme.appendChild(lumOff)
  }
  else if (brightness < 0) {
    const lumMod = doc.createElementNS(NS_A, 'a:lumMod')
    lumMod.setAttribute('val', String(Math.round((1 + brightness) * 100000)))
    scheme.appendChild(lumMod)
  }
  fill.appendChild(scheme)
  return fill
}

/**
 * Clone the template `a:rPr` (keeping font face, language, etc.) and
 * overwrite the style attributes the markup carries
 */
function buildRunProps(doc: Document, template: Element | null, style: RunStyle): Element {
  const rPr = template ? cloneElement(template) : doc.createElementNS(NS_A, 'a:rPr')

  // Absent b and i stay absent: they may be inherited from the layout or table style
  const bold = rPr.getAttribute('b')
  if (style.bold) rPr.setAttribute('b', '1')
  else if (bold) rPr.setAttribute('b', '0')

  const italic = rPr.getAttribute('i')
  if (style.italic) rPr.setAttribute('i', '1')
  else if (italic) rPr.setAttribute('i', '0')

  const underline = rPr.getAttribute('u')
  if (style.underline) rPr.setAttribute('u', underline && underline !== 'none' ? underline : 'sng')
  else if (underline) rPr.setAttribute('u', 'none')

  const strike = rPr.getAttribute('strike')
  if (style.strike) rPr.setAttribute('strike', strike && strike !== 'noStrike' ? strike : 'sngStrike')
  else if (strike) rPr.setAttribute('strike', 'noStrike')

  if (style.fontSizePt === null) rPr.removeAttribute('sz')
  else rPr.setAttribute('sz', String(Math.round(style.fontSizePt * 100)))

  if (style.color) {
    removeChildren(rPr, FILL_ELEMENTS)
    const ln = firstChild(rPr, 'a:ln')
    rPr.insertBefore(buildColor(doc, style.color), ln ? ln.nextSibling : rPr.firstChild)
  }
  else {
    removeChildren(rPr, ['a:solidFill'])
  }
  return rPr
}
