import type { Snapshot, SnapshotRequest, SystemDescription } from '@shared/types';

/**
 * Defines the contract for a physics engine driven by the step scheduler.
 * The scheduler decides when and how often to step; the engine does the
 * integration math.
 */
export interface IPhysicsEngine {
  readonly system: SystemDescription;

  /**
   * Integrates forward by exactly `steps` time steps.
   */
  advance(steps: number): void;

  /**
   * Performs a local energy minimization.
   * @param tolerance Largest force component, in kJ/(mol*nm), at which the
   * minimization counts as converged.
   * @param maxIterations Iteration cap; 0 means no cap.
   */
  minimize(tolerance: number, maxIterations: number): void;

  /**
   * Returns a snapshot carrying at least the requested components.
   */
  getSnapshot(request: SnapshotRequest): Snapshot;

  hasPeriodicBoundary(): boolean;
}
