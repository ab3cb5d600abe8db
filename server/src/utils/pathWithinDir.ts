import path from 'path'

/**
 * True when `filePath` resolves to an entry strictly inside `dir` (no traversal, not the dir itself).
 * The separator check keeps "/tmp-other" from passing for "/tmp".
 */
export function isPathWithinDir(dir: string, filePath: string): boolean {
  const resolvedDir = path.resolve(dir)
  const resolvedPath = path.resolve(filePath)
  return resolvedPath.startsWith(resolvedDir + path.sep)
}
