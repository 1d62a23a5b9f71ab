/**
 * Position Cell
 *
 * Latest estimate of the controller position, published by the sync driver
 * and read by anything that needs to know where playback is (the frame
 * stream, the UI). One writer, any number of readers. Readers always get a
 * complete snapshot, never a half-updated one.
 */

// ============================================================================
// Types
// ============================================================================

export type SyncHealth = "idle" | "synced" | "unreachable" | "lost";

export interface PositionSnapshot {
  /** Item being played, null when idle */
  itemId: string | null;
  playing: boolean;
  /** Estimated controller position at anchorAt (ms) */
  anchorMs: number;
  /** Local time the anchor refers to */
  anchorAt: number;
  /** Controller ms advanced per local ms */
  rate: number;
  sync: SyncHealth;
}

type SnapshotListener = (snapshot: Readonly<PositionSnapshot>) => void;

export function createIdleSnapshot(at = 0): PositionSnapshot {
  return { itemId: null, playing: false, anchorMs: 0, anchorAt: at, rate: 1, sync: "idle" };
}

// ============================================================================
// Cell
// ============================================================================

export class PositionCell {
  private snapshot: Readonly<PositionSnapshot> = Object.freeze(createIdleSnapshot());

  private listeners = new Set<SnapshotListener>();

  /** Replace the published snapshot */
  publish(next: PositionSnapshot): void {
    this.snapshot = Object.freeze({ ...next });
    for (const listener of this.listeners) {
      listener(this.snapshot);
    }
  }

  /** Current snapshot */
  read(): Readonly<PositionSnapshot> {
    return this.snapshot;
  }

  /**
   * Extrapolated position at a local instant, or null when nothing plays.
   * Never negative.
   */
  positionAt(now: number): number | null {
    const s = this.snapshot;
    if (!s.playing || s.itemId === null) return null;
    return Math.max(0, s.anchorMs + (now - s.anchorAt) * s.rate);
  }

  /** Subscribe to published snapshots */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
