import { describe, expect, it } from 'vitest'
import { PipelineError } from '../../src/lib/errors'
import {
  RESOLUTION_LABELS,
  lookupResolution,
  parseResolutionChoice,
  requireResolution,
} from '../../src/services/resolutions'

describe('resolution catalog', () => {
  it('looks up a known label', () => {
    expect(lookupResolution('480p')).toEqual({
      label: '480p',
      width: 854,
      height: 480,
      maxBitrateKbps: 1500,
      audioBitrateKbps: 128,
      quality: 'medium',
      crf: 22,
    })
  })

  it('returns undefined for an unknown label', () => {
    expect(lookupResolution('1080p')).toBeUndefined()
    expect(lookupResolution('toString')).toBeUndefined()
  })

  it('treats an unknown label as a caller error in requireResolution', () => {
    expect(() => requireResolution('1080p')).toThrowError(PipelineError)
    try {
      requireResolution('1080p')
    } catch (err) {
      expect(err).toBeInstanceOf(PipelineError)
      if (err instanceof PipelineError) expect(err.kind).toBe('UnknownResolution')
    }
  })

  it('keeps profiles immutable', () => {
    const profile = requireResolution('144p')
    expect(Object.isFrozen(profile)).toBe(true)
  })

  it('lists labels smallest first', () => {
    expect(RESOLUTION_LABELS).toEqual(['144p', '240p', '360p', '480p', '720p'])
  })

  it('expands "all" in catalog order', () => {
    expect(parseResolutionChoice('all')).toEqual(['144p', '240p', '360p', '480p', '720p'])
    expect(parseResolutionChoice(' ALL ')).toEqual(['144p', '240p', '360p', '480p', '720p'])
  })

  it('parses a single label and rejects anything else', () => {
    expect(parseResolutionChoice('720p')).toEqual(['720p'])
    expect(() => parseResolutionChoice('4k')).toThrowError(/Unsupported resolution: 4k/)
  })
})
