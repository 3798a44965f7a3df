import type { Snapshot, SystemDescription } from './types';

/**
 * What a reporter wants from the next report: how many steps away it is and
 * which state components it needs.
 */
export interface ReportRequest {
  steps: number;
  positions: boolean;
  velocities: boolean;
  forces: boolean;
  energy: boolean;
}

/**
 * Read-only view of a simulation handed to reporters.
 */
export interface ReportingSimulation {
  readonly currentStep: number;
  readonly system: SystemDescription;
}

/**
 * Defines the contract for an observer of a stepped simulation.
 * The scheduler queries every reporter once per round and never caches the
 * answer.
 */
export interface Reporter {
  /**
   * Describes the next report this reporter wants.
   * Must not have side effects.
   * @returns The request, or null when the reporter is not due this round.
   */
  describeNextReport(simulation: ReportingSimulation): ReportRequest | null;

  /**
   * Receives the shared snapshot of a step at which this reporter is due.
   * The snapshot is frozen and the same instance goes to every reporter due
   * at that step.
   */
  report(simulation: ReportingSimulation, snapshot: Snapshot): void;
}
