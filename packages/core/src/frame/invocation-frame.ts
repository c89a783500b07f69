/**
 * Invocation Frame
 * The suspended record of one module operation call. Holds the ordered inputs,
 * the output once produced, and the backward phase to run on resumption.
 */

import { v4 as uuidv4 } from 'uuid';
import { InvalidTransitionError, StateMachineError, logFrameTransition } from '@errata/shared';
import { FRAME_STATES, frameTransitions, type FrameState } from '../state-machine/index.js';
import { FrameLock } from '../lock/frame-lock.js';
import type { ValueNode } from '../graph/value-node.js';
import type { BackwardHandler } from './types.js';

export interface InvocationFrameInit {
  id?: string;
  moduleType: string;
  operation: string;
  inputs: readonly ValueNode[];
  inputNames: readonly string[];
  graphId: string;
  /** Used when restoring a snapshot */
  initialState?: FrameState;
}

export class InvocationFrame {
  readonly id: string;
  readonly moduleType: string;
  readonly operation: string;
  readonly inputs: readonly ValueNode[];
  readonly inputNames: readonly string[];
  readonly graphId: string;
  readonly createdAt: Date;
  readonly lock: FrameLock;

  private currentState: FrameState;
  private output: ValueNode | null = null;
  private backward: BackwardHandler | null = null;

  constructor(init: InvocationFrameInit) {
    if (init.inputs.length !== init.inputNames.length) {
      throw new StateMachineError('Frame inputs and input names differ in length', 'E5002', {
        operation: init.operation,
      });
    }
    this.id = init.id ?? uuidv4();
    this.moduleType = init.moduleType;
    this.operation = init.operation;
    this.inputs = [...init.inputs];
    this.inputNames = [...init.inputNames];
    this.graphId = init.graphId;
    this.createdAt = new Date();
    this.lock = new FrameLock(this.id);
    this.currentState = init.initialState ?? FRAME_STATES.FORWARD;
  }

  getState(): FrameState {
    return this.currentState;
  }

  getOutput(): ValueNode | null {
    return this.output;
  }

  getInput(name: string): ValueNode | undefined {
    const index = this.inputNames.indexOf(name);
    return index >= 0 ? this.inputs[index] : undefined;
  }

  hasInput(node: ValueNode): boolean {
    return this.inputs.some((input) => input.id === node.id);
  }

  hasBackward(): boolean {
    return this.backward !== null;
  }

  /**
   * Bind the output node. Called by the graph registry when the node is created.
   */
  attachOutput(node: ValueNode): void {
    if (this.output !== null) {
      throw new StateMachineError(`Frame ${this.id} already has an output`, 'E5003', {
        frameId: this.id,
        nodeId: node.id,
      });
    }
    this.output = node;
  }

  /**
   * End the forward phase. Without a backward phase the frame is exhausted
   * at once and its inputs are fixed.
   */
  suspend(backward?: BackwardHandler): void {
    if (backward) {
      this.transition(FRAME_STATES.SUSPENDED);
      this.backward = backward;
    } else {
      this.transition(FRAME_STATES.FORWARD_ONLY);
    }
  }

  fail(): void {
    this.transition(FRAME_STATES.FAILED);
  }

  /**
   * Move to resumed and hand out the backward phase
   */
  beginResume(): BackwardHandler {
    const handler = this.backward;
    if (handler === null) {
      throw new StateMachineError(`Frame ${this.id} has no backward phase`, 'E5004', {
        frameId: this.id,
      });
    }
    this.transition(FRAME_STATES.RESUMED);
    return handler;
  }

  exhaust(): void {
    if (this.currentState === FRAME_STATES.EXHAUSTED) return;
    this.transition(FRAME_STATES.EXHAUSTED);
    this.backward = null;
  }

  /**
   * Exhaust a suspended frame without revision
   */
  close(): void {
    if (this.currentState !== FRAME_STATES.SUSPENDED) {
      throw new InvalidTransitionError(this.currentState, FRAME_STATES.EXHAUSTED, {
        frameId: this.id,
        reason: 'only a suspended frame can be closed',
      });
    }
    this.exhaust();
  }

  isTerminal(): boolean {
    return frameTransitions.isTerminalState(this.currentState);
  }

  private transition(toState: FrameState): void {
    const fromState = this.currentState;
    frameTransitions.validateTransition(fromState, toState, { frameId: this.id });
    this.currentState = toState;
    logFrameTransition(this.id, fromState, toState, `${this.moduleType}.${this.operation}`);
  }
}
