import type { GroupShape, TableShape } from './types'
import { describe, expect, it } from 'vitest'
import { container, paragraph, run, textShape } from './test-utils'
import { walkShape, walkShapes, walkTextContainer } from './walker'

const box = { left: 0, top: 0, width: 1000, height: 1000 }

describe('walkTextContainer', () => {
  it('skips blank paragraphs and encodes the rest', () => {
    const seeds = walkTextContainer(container([
      paragraph(run('Hello', { bold: true })),
      paragraph(run('   ')),
      paragraph(),
      paragraph(run('World')),
    ]), 'standard')

    expect(seeds.map(seed => seed.markup)).toEqual(['<b>Hello</b>', 'World'])
    expect(seeds.map(seed => seed.rawLength)).toEqual([5, 5])
    expect(seeds.every(seed => seed.context === 'standard')).toBe(true)
  })

  it('measures the raw length without tags', () => {
    const [seed] = walkTextContainer(container([
      paragraph(run(' A ', { fontSizePt: 12 }), run('B', { italic: true })),
    ]), 'standard')
    expect(seed?.rawLength).toBe(4)
  })
})

describe('walkShape', () => {
  it('marks table cells as constrained', () => {
    const table: TableShape = {
      kind: 'table',
      id: '4',
      name: 'Table',
      ...box,
      cells: [
        { row: 0, col: 0, text: container([paragraph(run('Cell'))]) },
        { row: 0, col: 1, text: container([]) },
      ],
    }
    const seeds = walkShape(table)
    expect(seeds).toHaveLength(1)
    expect(seeds[0]?.context).toBe('constrained')
  })

  it('marks every shape inside a group as constrained, at any depth', () => {
    const inner: GroupShape = {
      kind: 'group',
      id: '3',
      name: 'Inner',
      ...box,
      children: [textShape(box, [paragraph(run('Deep'))])],
    }
    const outer: GroupShape = {
      kind: 'group',
      id: '2',
      name: 'Outer',
      ...box,
      children: [textShape(box, [paragraph(run('Shallow'))]), inner],
    }

    const seeds = walkShape(outer)
    expect(seeds.map(seed => seed.markup)).toEqual(['Shallow', 'Deep'])
    expect(seeds.every(seed => seed.context === 'constrained')).toBe(true)
  })

  it('keeps slide order across shapes and ignores graphics', () => {
    const seeds = walkShapes([
      textShape(box, [paragraph(run('First'))]),
      { kind: 'graphic', id: '9', name: 'Picture', ...box },
      textShape(box, [paragraph(run('Second'))]),
    ])
    expect(seeds.map(seed => seed.markup)).toEqual(['First', 'Second'])
    expect(seeds.every(seed => seed.context === 'standard')).toBe(true)
  })
})
