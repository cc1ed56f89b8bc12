/**
 * @fileoverview Loop Lifecycle Controller - enforces the phase machine of
 * one ReAct loop execution.
 *
 * The controller is the authoritative source for "what phase is this loop
 * in?" and rejects any transition the machine does not allow.
 *
 * State Machine:
 * ```
 *   IDLE ──► REASONING ──► ACTING
 *              ▲  │  ▲       │
 *              │  │  └───────┘
 *              │  ▼
 *              │ FINALIZING ──► DONE
 *              │                 ▲
 *              └─────────────────┘   (completion failure, cancellation)
 * ```
 *
 * Every non-terminal phase may move to DONE; DONE is terminal.
 *
 * @module scoutline/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { AgentPhase, createUniqueId, createTimestamp } from '../types/core.types.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'phase:enter': (phase: AgentPhase, metadata: PhaseMetadata) => void;
  'phase:exit': (phase: AgentPhase, metadata: PhaseMetadata) => void;
  'transition': (from: AgentPhase, to: AgentPhase, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

export interface PhaseMetadata {
  readonly enteredAt: Timestamp;
  readonly stepNumber: number;
  readonly reason: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface LifecycleError {
  readonly code: 'TERMINAL_STATE' | 'INVALID_TRANSITION';
  readonly message: string;
  readonly phase: AgentPhase;
  readonly attemptedTransition: AgentPhase;
}

/**
 * Snapshot of current lifecycle state.
 */
export interface LifecycleState {
  readonly runId: UniqueId;
  readonly currentPhase: AgentPhase;
  readonly previousPhase: AgentPhase | null;
  readonly stepNumber: number;
  readonly phaseHistory: ReadonlyArray<PhaseHistoryEntry>;
  readonly startedAt: Timestamp;
  readonly lastTransitionAt: Timestamp;
  readonly isTerminal: boolean;
}

export interface PhaseHistoryEntry {
  readonly phase: AgentPhase;
  readonly stepNumber: number;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp | null;
  readonly reason: string;
}

/**
 * Thrown by {@link LifecycleController.transition} on a rejected move.
 */
export class LifecycleTransitionError extends Error {
  constructor(readonly detail: LifecycleError) {
    super(detail.message);
    this.name = 'LifecycleTransitionError';
  }
}

/**
 * Valid transitions from each phase.
 */
const VALID_TRANSITIONS: ReadonlyMap<AgentPhase, ReadonlyArray<AgentPhase>> = new Map([
  [AgentPhase.IDLE, [AgentPhase.REASONING, AgentPhase.DONE]],
  [AgentPhase.REASONING, [AgentPhase.ACTING, AgentPhase.FINALIZING, AgentPhase.DONE]],
  [AgentPhase.ACTING, [AgentPhase.REASONING, AgentPhase.DONE]],
  [AgentPhase.FINALIZING, [AgentPhase.DONE]],
  [AgentPhase.DONE, []],
]);

const TERMINAL_PHASES: ReadonlySet<AgentPhase> = new Set([AgentPhase.DONE]);

/**
 * Tracks the phase of one loop execution.
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController();
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug(`${from} → ${to}`, { reason });
 * });
 *
 * lifecycle.transition(AgentPhase.REASONING, 'Loop started');
 * lifecycle.transition(AgentPhase.ACTING, 'Model requested web_search');
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private readonly runId: UniqueId;
  private currentPhase: AgentPhase;
  private previousPhase: AgentPhase | null;
  private stepNumber: number;
  private readonly phaseHistory: PhaseHistoryEntry[];
  private readonly startedAt: Timestamp;
  private lastTransitionAt: Timestamp;
  private currentPhaseEntry: PhaseHistoryEntry | null;

  constructor(runId?: UniqueId) {
    super();
    this.runId = runId ?? createUniqueId(uuidv4());
    this.currentPhase = AgentPhase.IDLE;
    this.previousPhase = null;
    this.stepNumber = 0;
    this.phaseHistory = [];
    this.startedAt = createTimestamp();
    this.lastTransitionAt = this.startedAt;
    this.currentPhaseEntry = null;

    this.enterPhase(AgentPhase.IDLE, 'Run created');
  }

  /**
   * Gets a snapshot of the lifecycle state.
   */
  getState(): LifecycleState {
    return {
      runId: this.runId,
      currentPhase: this.currentPhase,
      previousPhase: this.previousPhase,
      stepNumber: this.stepNumber,
      phaseHistory: [...this.phaseHistory],
      startedAt: this.startedAt,
      lastTransitionAt: this.lastTransitionAt,
      isTerminal: this.isTerminal(),
    };
  }

  /**
   * Gets the current phase.
   */
  getCurrentPhase(): AgentPhase {
    return this.currentPhase;
  }

  /**
   * Gets the number of transitions made so far.
   */
  getStepNumber(): number {
    return this.stepNumber;
  }

  isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.currentPhase);
  }

  /**
   * Checks whether a move to `targetPhase` is allowed from the current phase.
   */
  canTransition(targetPhase: AgentPhase): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase);
    return validTargets !== undefined && validTargets.includes(targetPhase);
  }

  /**
   * Moves to a new phase.
   *
   * @throws LifecycleTransitionError if the move is not allowed
   */
  transition(targetPhase: AgentPhase, reason: string, data: Record<string, unknown> = {}): void {
    if (this.isTerminal()) {
      this.reject({
        code: 'TERMINAL_STATE',
        message: `Cannot transition from terminal state '${this.currentPhase}'`,
        phase: this.currentPhase,
        attemptedTransition: targetPhase,
      });
    }

    if (!this.canTransition(targetPhase)) {
      this.reject({
        code: 'INVALID_TRANSITION',
        message: `Invalid transition: '${this.currentPhase}' → '${targetPhase}'`,
        phase: this.currentPhase,
        attemptedTransition: targetPhase,
      });
    }

    this.exitPhase();

    this.previousPhase = this.currentPhase;
    this.currentPhase = targetPhase;
    this.lastTransitionAt = createTimestamp();
    this.stepNumber++;

    this.emit('transition', this.previousPhase, this.currentPhase, reason);
    this.enterPhase(targetPhase, reason, data);
  }

  /**
   * Moves to DONE from whatever phase the run is in. No-op when already done.
   */
  finish(reason: string, data: Record<string, unknown> = {}): void {
    if (this.isTerminal()) {
      return;
    }
    this.transition(AgentPhase.DONE, reason, data);
  }

  // ============ Private Methods ============

  private reject(error: LifecycleError): never {
    this.emit('error', error);
    throw new LifecycleTransitionError(error);
  }

  private enterPhase(phase: AgentPhase, reason: string, data: Record<string, unknown> = {}): void {
    const now = createTimestamp();

    this.currentPhaseEntry = {
      phase,
      stepNumber: this.stepNumber,
      enteredAt: now,
      exitedAt: null,
      reason,
    };

    this.emit('phase:enter', phase, {
      enteredAt: now,
      stepNumber: this.stepNumber,
      reason,
      data,
    });
  }

  private exitPhase(): void {
    if (!this.currentPhaseEntry) {
      return;
    }

    this.phaseHistory.push({ ...this.currentPhaseEntry, exitedAt: createTimestamp() });

    this.emit('phase:exit', this.currentPhase, {
      enteredAt: this.currentPhaseEntry.enteredAt,
      stepNumber: this.currentPhaseEntry.stepNumber,
      reason: this.currentPhaseEntry.reason,
      data: {},
    });
    this.currentPhaseEntry = null;
  }
}
