import type { UserId } from '../models/Job'

/**
 * Users with a job in flight. At most one job per user; a second request is rejected, not queued.
 * Check-and-set runs synchronously on the event loop, so no two callers can both admit the same user.
 */
export class AdmissionRegistry {
  private readonly inFlight = new Set<UserId>()

  tryAdmit(userId: UserId): boolean {
    if (this.inFlight.has(userId)) return false
    this.inFlight.add(userId)
    return true
  }

  release(userId: UserId): void {
    this.inFlight.delete(userId)
  }

  has(userId: UserId): boolean {
    return this.inFlight.has(userId)
  }

  get size(): number {
    return this.inFlight.size
  }
}
