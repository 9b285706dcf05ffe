/**
 * Cursor over the result list of the most recent query.
 *
 * States:
 * - empty: no active results; every navigation reports "empty"
 * - active: at least one result, cursor within [0, length - 1]
 *
 * Loading results always resets the cursor to the first result. Movement
 * clamps at both ends instead of wrapping.
 */

export type NavigationState = "empty" | "active";

export type NavigationOutcome = "moved" | "at-first" | "at-last" | "empty";

export interface NavigationResult {
  outcome: NavigationOutcome;
  /** The result under the cursor, null while empty. */
  current: string | null;
  cursor: number;
  total: number;
}

export interface NavigationSnapshot {
  results: string[];
  cursor: number;
}

export interface NavigationChangeEvent {
  from: NavigationState;
  to: NavigationState;
  total: number;
}

export type NavigationChangeListener = (event: NavigationChangeEvent) => void;

export function clampCursor(cursor: number, total: number): number {
  if (total === 0) return 0;
  return Math.min(Math.max(0, Math.trunc(cursor)), total - 1);
}

export class SearchNavigator {
  private results: string[] = [];
  private cursor = 0;
  private listeners: NavigationChangeListener[] = [];

  getState(): NavigationState {
    return this.results.length === 0 ? "empty" : "active";
  }

  /** Replace the results, e.g. after a query. Cursor goes back to 0. */
  load(results: readonly string[]): void {
    this.replace([...results], 0);
  }

  /** Restore a saved position; the cursor is clamped to the results. */
  restore(snapshot: NavigationSnapshot): void {
    this.replace([...snapshot.results], clampCursor(snapshot.cursor, snapshot.results.length));
  }

  snapshot(): NavigationSnapshot {
    return { results: [...this.results], cursor: this.cursor };
  }

  current(): string | null {
    return this.results[this.cursor] ?? null;
  }

  next(): NavigationResult {
    if (this.getState() === "empty") return this.result("empty");
    if (this.cursor >= this.results.length - 1) return this.result("at-last");
    this.cursor++;
    return this.result("moved");
  }

  prev(): NavigationResult {
    if (this.getState() === "empty") return this.result("empty");
    if (this.cursor === 0) return this.result("at-first");
    this.cursor--;
    return this.result("moved");
  }

  first(): NavigationResult {
    if (this.getState() === "empty") return this.result("empty");
    this.cursor = 0;
    return this.result("moved");
  }

  last(): NavigationResult {
    if (this.getState() === "empty") return this.result("empty");
    this.cursor = this.results.length - 1;
    return this.result("moved");
  }

  /** Register a listener for state changes. Returns an unsubscribe function. */
  onStateChange(listener: NavigationChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private replace(results: string[], cursor: number): void {
    const from = this.getState();
    this.results = results;
    this.cursor = cursor;
    const event: NavigationChangeEvent = { from, to: this.getState(), total: results.length };
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private result(outcome: NavigationOutcome): NavigationResult {
    return {
      outcome,
      current: this.current(),
      cursor: this.cursor,
      total: this.results.length,
    };
  }
}
