import path from 'path'

/** Letters, numbers, dot, dash, underscore, space. */
const SAFE_FILENAME_REGEX = /[^a-zA-Z0-9._\-\s]/g

/** Markdown control characters that would break a caption. */
const MARKDOWN_CHARS = /[*_`[\]]/g

/**
 * Sanitize a user-provided file name before showing it back in a message.
 * - Takes basename (strips path components and NULL bytes)
 * - Restricts to safe chars, collapses whitespace
 * - Strips characters Telegram Markdown treats as markup
 * - Falls back to "video.mp4" when nothing is left
 */
export function sanitizeFilename(originalName: string | undefined): string {
  if (originalName == null) return 'video.mp4'
  let base = path.basename(originalName.replace(/\0/g, ''))
  base = base.replace(/[/\\]/g, '')
  const safe = base
    .replace(SAFE_FILENAME_REGEX, '')
    .replace(MARKDOWN_CHARS, '')
    .replace(/\s+/g, ' ')
    .trim()
  return safe.length > 0 ? safe : 'video.mp4'
}
