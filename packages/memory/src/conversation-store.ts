import type { Turn } from "@errand/schemas";

export const DEFAULT_WINDOW_TURNS = 20;

/**
 * Ordered log of one conversation. Append-only while a run owns it; only
 * an explicit reset() empties it.
 */
export class ConversationStore {
  private turns: Turn[] = [];

  append(turn: Turn): void {
    this.turns.push(Object.freeze({ ...turn }));
  }

  /** The last n turns, oldest first. */
  window(n: number = DEFAULT_WINDOW_TURNS): Turn[] {
    if (n <= 0) return [];
    return this.turns.slice(-n);
  }

  full(): Turn[] {
    return [...this.turns];
  }

  reset(): void {
    this.turns = [];
  }

  get size(): number {
    return this.turns.length;
  }
}
