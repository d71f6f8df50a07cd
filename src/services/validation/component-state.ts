// Component validation lifecycle

import { ComponentState } from '../../models/types.js';
import { StateTransitionError } from '../../core/errors.js';

/**
 * Allowed transitions.
 *
 * ARTIFACT_CHECKED loops to itself when a missing target is passed over
 * without short-circuiting, and CONTENT_CHECKED returns to it for the next
 * target. SHORT_CIRCUITED can only finish.
 */
const TRANSITIONS: Record<ComponentState, readonly ComponentState[]> = {
  NOT_STARTED: ['ARTIFACT_CHECKED'],
  ARTIFACT_CHECKED: ['ARTIFACT_CHECKED', 'CONTENT_CHECKED', 'SHORT_CIRCUITED', 'DONE'],
  CONTENT_CHECKED: ['ARTIFACT_CHECKED', 'DONE'],
  SHORT_CIRCUITED: ['DONE'],
  DONE: []
};

export class ComponentStateMachine {
  private current: ComponentState = 'NOT_STARTED';
  private visited: ComponentState[] = ['NOT_STARTED'];

  get state(): ComponentState {
    return this.current;
  }

  /**
   * Every state entered so far, in order
   */
  get history(): readonly ComponentState[] {
    return this.visited;
  }

  get shortCircuited(): boolean {
    return this.visited.includes('SHORT_CIRCUITED');
  }

  canTransition(to: ComponentState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: ComponentState): void {
    if (!this.canTransition(to)) {
      throw new StateTransitionError(this.current, to);
    }
    this.current = to;
    this.visited.push(to);
  }
}
