/**
 * Answers whether one actor can currently perceive another (stealth/reveal).
 */
export interface VisibilitySource {
  canPerceive(viewerId: number, targetId: number): boolean;
}

/**
 * In-process stealth bookkeeping.
 *
 * A hidden actor is imperceptible to everyone except itself and the
 * viewers it has been revealed to. Reveals are dropped when the actor
 * leaves stealth.
 */
export class VisibilityService implements VisibilitySource {
  private readonly hiddenActors = new Set<number>();
  private readonly revealedTo = new Map<number, Set<number>>();

  setHidden(actorId: number, hidden: boolean): void {
    if (hidden) {
      this.hiddenActors.add(actorId);
      return;
    }
    this.hiddenActors.delete(actorId);
    this.revealedTo.delete(actorId);
  }

  isHidden(actorId: number): boolean {
    return this.hiddenActors.has(actorId);
  }

  reveal(targetId: number, viewerId: number): void {
    let viewers = this.revealedTo.get(targetId);
    if (!viewers) {
      viewers = new Set();
      this.revealedTo.set(targetId, viewers);
    }
    viewers.add(viewerId);
  }

  canPerceive(viewerId: number, targetId: number): boolean {
    if (viewerId === targetId) return true;
    if (!this.hiddenActors.has(targetId)) return true;
    return this.revealedTo.get(targetId)?.has(viewerId) ?? false;
  }

  forget(actorId: number): void {
    this.hiddenActors.delete(actorId);
    this.revealedTo.delete(actorId);
    for (const viewers of this.revealedTo.values()) {
      viewers.delete(actorId);
    }
  }
}
