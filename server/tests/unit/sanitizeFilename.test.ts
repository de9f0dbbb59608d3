import { describe, expect, it } from 'vitest'
import { sanitizeFilename } from '../../src/utils/sanitizeFilename'

describe('sanitizeFilename', () => {
  it('keeps a plain name', () => {
    expect(sanitizeFilename('Holiday clip 2024.mp4')).toBe('Holiday clip 2024.mp4')
  })

  it('drops directories and markup characters', () => {
    expect(sanitizeFilename('/home/user/my_*best*_[cut].mp4')).toBe('mybestcut.mp4')
  })

  it('falls back when nothing usable is left', () => {
    expect(sanitizeFilename(undefined)).toBe('video.mp4')
    expect(sanitizeFilename('***')).toBe('video.mp4')
  })
})
