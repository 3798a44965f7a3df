import type { Reporter, ReportingSimulation, ReportRequest } from '@shared/reporter';
import type { Snapshot, SnapshotRequest, SystemDescription } from '@shared/types';
import type { IPhysicsEngine } from '../src/engine/physicsEngine';

export const EMPTY_SYSTEM: SystemDescription = { particles: [], bonds: [], box: null };

// Records every engine call instead of integrating anything.
export class FakeEngine implements IPhysicsEngine {
  readonly system: SystemDescription;
  advances: number[] = [];
  snapshotRequests: SnapshotRequest[] = [];
  minimizeCalls: Array<[number, number]> = [];
  failAfterSteps: number | null = null;
  private stepped = 0;

  constructor(system: SystemDescription = EMPTY_SYSTEM) {
    this.system = system;
  }

  get totalSteps(): number {
    return this.stepped;
  }

  advance(steps: number): void {
    if (this.failAfterSteps !== null && this.stepped + steps > this.failAfterSteps) {
      throw new Error('integration blew up');
    }
    this.advances.push(steps);
    this.stepped += steps;
  }

  minimize(tolerance: number, maxIterations: number): void {
    this.minimizeCalls.push([tolerance, maxIterations]);
  }

  getSnapshot(request: SnapshotRequest): Snapshot {
    this.snapshotRequests.push(request);
    return { time: this.stepped, boxVectors: null };
  }

  hasPeriodicBoundary(): boolean {
    return this.system.box !== null;
  }
}

export interface ReceivedReport {
  step: number;
  snapshot: Snapshot;
}

// Fires every `interval` steps and remembers what it was handed.
export class IntervalReporter implements Reporter {
  received: ReceivedReport[] = [];
  private readonly needs: Omit<ReportRequest, 'steps'>;

  constructor(
    readonly interval: number,
    needs: Partial<Omit<ReportRequest, 'steps'>> = {},
  ) {
    this.needs = { positions: false, velocities: false, forces: false, energy: false, ...needs };
  }

  get steps(): number[] {
    return this.received.map(r => r.step);
  }

  describeNextReport(simulation: ReportingSimulation): ReportRequest {
    return { steps: this.interval - (simulation.currentStep % this.interval), ...this.needs };
  }

  report(simulation: ReportingSimulation, snapshot: Snapshot): void {
    this.received.push({ step: simulation.currentStep, snapshot });
  }
}
