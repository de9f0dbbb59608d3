import path from 'path'

/**
 * Assert that a file path resolves inside the given directory (no path traversal).
 * @throws Error if filePath resolves outside dir, or to dir itself
 */
export function assertPathWithinDir(dir: string, filePath: string): void {
  const resolvedDir = path.resolve(dir)
  const resolvedPath = path.resolve(filePath)
  const relative = path.relative(resolvedDir, resolvedPath)
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error('Path must be within allowed directory')
  }
}
