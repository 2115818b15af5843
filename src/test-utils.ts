import type { PackageFiles } from './pptx-utils'
import type { Box, Paragraph, StyledRun, TextContainer, TextShape } from './types'
import { PLAIN_STYLE } from './markup'

// Builders for small in-memory decks and model objects used across the tests

const NAMESPACES = [
  'xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main"',
  'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"',
  'xmlns:p="http://schemas.openxmlformats.org/presentationml/2006/main"',
].join(' ')

const REL_NS = 'http://schemas.openxmlformats.org/package/2006/relationships'
const REL_TYPE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships'
const DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>'

export function run(text: string, style: Partial<StyledRun> = {}): StyledRun {
  return { ...PLAIN_STYLE, ...style, text }
}

export function paragraph(...runs: StyledRun[]): Paragraph {
  return { runs, modified: false }
}

export function container(paragraphs: Paragraph[], width = 0, height = 0): TextContainer {
  return { paragraphs, width, height, wordWrap: true }
}

export function textShape(box: Box, paragraphs: Paragraph[], name = 'TextBox'): TextShape {
  return { kind: 'text', id: name, name, ...box, text: container(paragraphs, box.width, box.height) }
}

function xfrm(box: Box, tag = 'a:xfrm'): string {
  return `<${tag}><a:off x="${box.left}" y="${box.top}"/><a:ext cx="${box.width}" cy="${box.height}"/></${tag}>`
}

export function runXml(text: string, attrs = '', children = ''): string {
  return `<a:r><a:rPr lang="en-US"${attrs ? ` ${attrs}` : ''}>${children}</a:rPr><a:t>${text}</a:t></a:r>`
}

export function paragraphXml(...content: string[]): string {
  return `<a:p>${content.join('')}</a:p>`
}

function txBody(paragraphs: string[], wrap = 'square'): string {
  return `<p:txBody><a:bodyPr wrap="${wrap}"/><a:lstStyle/>${paragraphs.join('')}</p:txBody>`
}

export function textShapeXml(options: {
  id: number
  name: string
  box?: Box
  placeholder?: string
  wrap?: string
  paragraphs: string[]
}): string {
  const nvPr = options.placeholder ? `<p:nvPr>${options.placeholder}</p:nvPr>` : '<p:nvPr/>'
  return `<p:sp><p:nvSpPr><p:cNvPr id="${options.id}" name="${options.name}"/><p:cNvSpPr/>${nvPr}</p:nvSpPr>`
    + `<p:spPr>${options.box ? xfrm(options.box) : ''}</p:spPr>`
    + `${txBody(options.paragraphs, options.wrap)}</p:sp>`
}

export function tableXml(options: {
  id: number
  name: string
  box: Box
  columns: number[]
  rows: { height: number, cells: string[] }[]
}): string {
  const grid = options.columns.map(w => `<a:gridCol w="${w}"/>`).join('')
  const rows = options.rows
    .map(row => `<a:tr h="${row.height}">${row.cells.join('')}</a:tr>`)
    .join('')
  return `<p:graphicFrame><p:nvGraphicFramePr><p:cNvPr id="${options.id}" name="${options.name}"/>`
    + `<p:cNvGraphicFramePr/><p:nvPr/></p:nvGraphicFramePr>${xfrm(options.box, 'p:xfrm')}`
    + `<a:graphic><a:graphicData uri="http://schemas.openxmlformats.org/drawingml/2006/table">`
    + `<a:tbl><a:tblPr/><a:tblGrid>${grid}</a:tblGrid>${rows}</a:tbl></a:graphicData></a:graphic></p:graphicFrame>`
}

export function cellXml(paragraphs: string[], attrs = ''): string {
  return `<a:tc${attrs ? ` ${attrs}` : ''}><a:txBody><a:bodyPr/><a:lstStyle/>${paragraphs.join('')}</a:txBody><a:tcPr/></a:tc>`
}

export function groupXml(options: { id: number, name: string, box: Box, children: string[] }): string {
  return `<p:grpSp><p:nvGrpSpPr><p:cNvPr id="${options.id}" name="${options.name}"/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr>`
    + `<p:grpSpPr>${xfrm(options.box)}</p:grpSpPr>${options.children.join('')}</p:grpSp>`
}

export function pictureXml(options: { id: number, name: string, box: Box }): string {
  return `<p:pic><p:nvPicPr><p:cNvPr id="${options.id}" name="${options.name}"/><p:cNvPicPr/><p:nvPr/></p:nvPicPr>`
    + `<p:blipFill/><p:spPr>${xfrm(options.box)}</p:spPr></p:pic>`
}

export function slideXml(shapes: string[]): string {
  return `${DECLARATION}<p:sld ${NAMESPACES}><p:cSld><p:spTree>`
    + '<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>'
    + `${shapes.join('')}</p:spTree></p:cSld></p:sld>`
}

function relsXml(rels: { id: string, type: string, target: string }[]): string {
  const items = rels
    .map(rel => `<Relationship Id="${rel.id}" Type="${REL_TYPE}/${rel.type}" Target="${rel.target}"/>`)
    .join('')
  return `${DECLARATION}<Relationships xmlns="${REL_NS}">${items}</Relationships>`
}

const encode = (text: string) => new TextEncoder().encode(text)

/**
 * A minimal package: presentation part, slides, and optionally one layout
 * (with its placeholders) shared by every slide
 */
export function buildPackage(
  slides: string[],
  options: { slideWidth?: number, slideHeight?: number, layoutShapes?: string[] } = {},
): PackageFiles {
  const slideWidth = options.slideWidth ?? 9144000
  const slideHeight = options.slideHeight ?? 6858000
  const ids = slides.map((_, i) => `<p:sldId id="${256 + i}" r:id="rId${i + 2}"/>`).join('')

  const files: PackageFiles = {
    'ppt/presentation.xml': encode(
      `${DECLARATION}<p:presentation ${NAMESPACES}><p:sldIdLst>${ids}</p:sldIdLst>`
      + `<p:sldSz cx="${slideWidth}" cy="${slideHeight}"/></p:presentation>`,
    ),
    'ppt/_rels/presentation.xml.rels': encode(relsXml(
      slides.map((_, i) => ({ id: `rId${i + 2}`, type: 'slide', target: `slides/slide${i + 1}.xml` })),
    )),
  }

  slides.forEach((xml, i) => {
    files[`ppt/slides/slide${i + 1}.xml`] = encode(xml)
    if (options.layoutShapes) {
      files[`ppt/slides/_rels/slide${i + 1}.xml.rels`] = encode(relsXml([
        { id: 'rId1', type: 'slideLayout', target: '../slideLayouts/slideLayout1.xml' },
      ]))
    }
  })

  if (options.layoutShapes) {
    files['ppt/slideLayouts/slideLayout1.xml'] = encode(
      `${DECLARATION}<p:sldLayout ${NAMESPACES}><p:cSld><p:spTree>`
      + `<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>`
      + `${options.layoutShapes.join('')}</p:spTree></p:cSld></p:sldLayout>`,
    )
  }
  return files
}
