import { readFile, writeFile } from 'node:fs/promises'
import { promisify } from 'node:util'
import { unzip, zip } from 'fflate'

export type PackageFiles = Record<string, Uint8Array>

const unzipAsync = promisify(
  (
    data: Uint8Array,
    cb: (err: Error | null, result: PackageFiles) => void,
  ) => unzip(data, cb),
)

const zipAsync = promisify(
  (
    data: PackageFiles,
    cb: (err: Error | null, result: Uint8Array) => void,
  ) => zip(data, cb),
)

/**
 * Extract all files from a PPTX (which is a ZIP archive)
 */
export async function extractPptx(pptxPath: string): Promise<PackageFiles> {
  const buffer = await readFile(pptxPath)
  return await unzipAsync(new Uint8Array(buffer))
}

/**
 * Create a PPTX file from the extracted files
 */
export async function createPptx(
  files: PackageFiles,
  outputPath: string,
): Promise<void> {
  const zipped = await zipAsync(files)
  await writeFile(outputPath, zipped)
}

export function hasFile(files: PackageFiles, path: string): boolean {
  return files[path] !== undefined
}

/**
 * Get text content from an XML file in the PPTX
 */
export function getXmlContent(files: PackageFiles, path: string): string {
  const file = files[path]
  if (!file) {
    throw new Error(`File not found in PPTX: ${path}`)
  }
  return new TextDecoder().decode(file)
}

/**
 * Set text content for an XML file in the PPTX
 */
export function setXmlContent(
  files: PackageFiles,
  path: string,
  content: string,
): void {
  files[path] = new TextEncoder().encode(content)
}

/**
 * Relationships part of a package part, e.g.
 * "ppt/slides/slide1.xml" -> "ppt/slides/_rels/slide1.xml.rels"
 */
export function relsPathFor(partPath: string): string {
  const slash = partPath.lastIndexOf('/')
  return `${partPath.slice(0, slash + 1)}_rels/${partPath.slice(slash + 1)}.rels`
}

/**
 * Resolve a relationship target relative to the part that owns it
 */
export function resolveTarget(partPath: string, target: string): string {
  if (target.startsWith('/')) return target.slice(1)

  const segments = partPath.split('/').slice(0, -1)
  for (const segment of target.split('/')) {
    if (segment === '..') segments.pop()
    else if (segment !== '.' && segment !== '') segments.push(segment)
  }
  return segments.join('/')
}
