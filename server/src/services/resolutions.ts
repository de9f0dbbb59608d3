import { PipelineError } from '../lib/errors'

export type ResolutionLabel = '144p' | '240p' | '360p' | '480p' | '720p'

export type QualityTier = 'low' | 'medium' | 'high'

export interface ResolutionProfile {
  label: ResolutionLabel
  width: number
  height: number
  maxBitrateKbps: number
  audioBitrateKbps: number
  quality: QualityTier
  /** x264 constant rate factor for this tier. */
  crf: number
}

const PROFILES: Record<ResolutionLabel, ResolutionProfile> = {
  '144p': { label: '144p', width: 256, height: 144, maxBitrateKbps: 200, audioBitrateKbps: 128, quality: 'low', crf: 28 },
  '240p': { label: '240p', width: 426, height: 240, maxBitrateKbps: 400, audioBitrateKbps: 128, quality: 'low', crf: 26 },
  '360p': { label: '360p', width: 640, height: 360, maxBitrateKbps: 800, audioBitrateKbps: 128, quality: 'medium', crf: 24 },
  '480p': { label: '480p', width: 854, height: 480, maxBitrateKbps: 1500, audioBitrateKbps: 128, quality: 'medium', crf: 22 },
  '720p': { label: '720p', width: 1280, height: 720, maxBitrateKbps: 2500, audioBitrateKbps: 128, quality: 'high', crf: 20 },
}

for (const profile of Object.values(PROFILES)) Object.freeze(profile)
Object.freeze(PROFILES)

/** Catalog order, smallest first. */
export const RESOLUTION_LABELS: readonly ResolutionLabel[] = Object.freeze(['144p', '240p', '360p', '480p', '720p'])

export const ALL_RESOLUTIONS_CHOICE = 'all'

export function isResolutionLabel(value: string): value is ResolutionLabel {
  return Object.prototype.hasOwnProperty.call(PROFILES, value)
}

export function lookupResolution(label: string): ResolutionProfile | undefined {
  return isResolutionLabel(label) ? PROFILES[label] : undefined
}

/** Like lookupResolution, but an unknown label is a caller error. */
export function requireResolution(label: string): ResolutionProfile {
  const profile = lookupResolution(label)
  if (!profile) {
    throw new PipelineError('UnknownResolution', `Unsupported resolution: ${label}`)
  }
  return profile
}

/** "all" expands to every label in catalog order; anything else must be a single known label. */
export function parseResolutionChoice(choice: string): ResolutionLabel[] {
  const normalized = choice.trim().toLowerCase()
  if (normalized === ALL_RESOLUTIONS_CHOICE) return [...RESOLUTION_LABELS]
  return [requireResolution(normalized).label]
}
