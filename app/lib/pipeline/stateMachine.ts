/**
 * stateMachine.ts
 *
 * Per-track lifecycle. Illegal transitions throw; every transition is
 * kept in `history`.
 */

import type { TerminalState, TrackState } from "./types";

const TRANSITIONS: Record<TrackState, readonly TrackState[]> = {
  PENDING: ["RESEARCHED", "REJECTED", "DEFERRED"],
  RESEARCHED: ["REMIX_CHECKED", "DECIDED", "REJECTED"],
  REMIX_CHECKED: ["CLASSIFIED", "DECIDED", "REJECTED"],
  CLASSIFIED: ["MATCHED", "DECIDED", "REJECTED"],
  MATCHED: ["DECIDED", "REJECTED"],
  DECIDED: ["ACCEPTED", "REJECTED", "DEFERRED"],
  ACCEPTED: [],
  REJECTED: [],
  DEFERRED: [],
};

export class IllegalTransition extends Error {
  constructor(
    public readonly trackId: string,
    public readonly from: TrackState,
    public readonly to: TrackState,
  ) {
    super(`Track ${trackId}: illegal transition ${from} -> ${to}`);
    this.name = "IllegalTransition";
  }
}

export function isTerminal(state: TrackState): state is TerminalState {
  return TRANSITIONS[state].length === 0;
}

export class TrackLifecycle {
  private current: TrackState = "PENDING";
  private readonly trail: TrackState[] = ["PENDING"];

  constructor(public readonly trackId: string) {}

  get state(): TrackState {
    return this.current;
  }

  get history(): TrackState[] {
    return [...this.trail];
  }

  transition(next: TrackState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransition(this.trackId, this.current, next);
    }
    this.current = next;
    this.trail.push(next);
  }

  /**
   * Move to DECIDED and on to the terminal state
   */
  settle(terminal: TerminalState): TerminalState {
    if (this.current !== "DECIDED") this.transition("DECIDED");
    this.transition(terminal);
    return terminal;
  }
}
