/**
 * State transition definitions and validation
 */

import { InvalidTransitionError } from '@errata/shared';

export interface StateTransition<S extends string> {
  from: S;
  to: S;
  condition?: string;
}

export class TransitionValidator<S extends string> {
  private transitionMap: Map<S, StateTransition<S>[]>;
  private terminalStates: ReadonlySet<S>;

  constructor(transitions: readonly StateTransition<S>[], terminalStates: readonly S[]) {
    this.transitionMap = new Map();
    this.terminalStates = new Set(terminalStates);

    for (const transition of transitions) {
      const existing = this.transitionMap.get(transition.from) || [];
      existing.push(transition);
      this.transitionMap.set(transition.from, existing);
    }
  }

  /**
   * Check if a transition is valid
   */
  isValidTransition(from: S, to: S): boolean {
    const transitions = this.transitionMap.get(from) || [];
    return transitions.some((t) => t.to === to);
  }

  /**
   * Get all valid transitions from a state
   */
  getValidTransitions(from: S): S[] {
    const transitions = this.transitionMap.get(from) || [];
    return transitions.map((t) => t.to);
  }

  /**
   * Validate and throw if invalid
   */
  validateTransition(from: S, to: S, context: Record<string, unknown> = {}): void {
    if (!this.isValidTransition(from, to)) {
      throw new InvalidTransitionError(from, to, {
        ...context,
        validTransitions: this.getValidTransitions(from),
      });
    }
  }

  isTerminalState(state: S): boolean {
    return this.terminalStates.has(state);
  }
}
