import { setImmediate as nextTurn } from 'node:timers/promises';
import type { Reporter, ReportingSimulation, ReportRequest } from '@shared/reporter';
import type { Snapshot, Vec3 } from '@shared/types';
import type { IPhysicsEngine } from '../engine/physicsEngine';
import { ReporterContractError, SchedulerFault, StepInterruptedError } from '../errors';
import { combineRequests } from './snapshotRequest';

export interface DueReporter {
    reporter: Reporter;
    request: ReportRequest;
}

export interface RoundPlan {
    // Steps to advance before the next checkpoint
    steps: number;
    // Reporters due at that checkpoint, in registration order
    due: DueReporter[];
}

/**
 * One stepping operation: everything the scheduler borrows from the
 * simulation for the duration of a run.
 */
export interface StepRun {
    readonly simulation: ReportingSimulation;
    readonly engine: IPhysicsEngine;
    readonly reporters: readonly Reporter[];
    // Absolute step at which the run ends
    readonly target: number;
    readonly chunkSize: number;
    // Checked between chunks; the run stops with StepInterruptedError once aborted
    readonly signal?: AbortSignal;
    // Adds progress to the simulation's step counter
    commit(steps: number): void;
}

/**
 * Queries every reporter and picks the nearest checkpoint within `remaining`
 * steps. Reporters answering null sit this round out.
 */
export function planRound(
    reporters: readonly Reporter[],
    simulation: ReportingSimulation,
    remaining: number,
): RoundPlan {
    let steps = remaining;
    const candidates: DueReporter[] = [];

    for (const reporter of reporters) {
        const request = reporter.describeNextReport(simulation);
        if (request === null) continue;
        if (!Number.isInteger(request.steps) || request.steps <= 0) {
            throw new ReporterContractError(
                `describeNextReport must return a positive integer step count or null, got ${request.steps}`,
            );
        }
        candidates.push({ reporter, request });
        steps = Math.min(steps, request.steps);
    }

    return { steps, due: candidates.filter(c => c.request.steps === steps) };
}

const freezeVectors = (vectors: readonly Vec3[] | undefined): void => {
    if (!vectors) return;
    vectors.forEach(v => Object.freeze(v));
    Object.freeze(vectors);
};

function freezeSnapshot(snapshot: Snapshot): Snapshot {
    freezeVectors(snapshot.positions);
    freezeVectors(snapshot.velocities);
    freezeVectors(snapshot.forces);
    freezeVectors(snapshot.boxVectors ?? undefined);
    return Object.freeze(snapshot);
}

/**
 * Executes rounds until the simulation reaches `run.target`. The engine is
 * advanced at most `chunkSize` steps at a time; the generator yields the
 * current step at every boundary between chunks.
 */
export function* stepRounds(run: StepRun): Generator<number, void, void> {
    const { simulation, engine, reporters, target } = run;
    const chunkSize = Math.max(1, Math.floor(run.chunkSize));

    while (simulation.currentStep < target) {
        const plan = planRound(reporters, simulation, target - simulation.currentStep);

        let stepsToGo = plan.steps;
        while (stepsToGo > 0) {
            const chunk = Math.min(chunkSize, stepsToGo);
            engine.advance(chunk);
            run.commit(chunk);
            stepsToGo -= chunk;
            if (stepsToGo > 0) yield simulation.currentStep;
        }

        if (plan.due.length > 0) {
            const request = combineRequests(plan.due.map(d => d.request), engine.hasPeriodicBoundary());
            const snapshot = freezeSnapshot(engine.getSnapshot(request));
            for (const { reporter } of plan.due) {
                reporter.report(simulation, snapshot);
            }
        }

        if (simulation.currentStep < target) yield simulation.currentStep;
    }
}

function toFault(error: unknown, step: number): Error {
    if (error instanceof SchedulerFault || error instanceof StepInterruptedError) return error;
    return new SchedulerFault(step, error);
}

// A signal that fired before the run started stops it before the first chunk.
function throwIfInterrupted(run: StepRun): void {
    if (run.signal?.aborted) throw new StepInterruptedError(run.simulation.currentStep);
}

/**
 * Drives a run to completion on the calling stack.
 */
export function runSteps(run: StepRun): void {
    try {
        throwIfInterrupted(run);
        for (const step of stepRounds(run)) {
            if (run.signal?.aborted) throw new StepInterruptedError(step);
        }
    } catch (error) {
        throw toFault(error, run.simulation.currentStep);
    }
}

/**
 * Drives a run to completion, giving the event loop a turn between chunks so
 * timers, I/O and signal handlers keep running.
 */
export async function runStepsAsync(run: StepRun): Promise<void> {
    try {
        throwIfInterrupted(run);
        for (const step of stepRounds(run)) {
            await nextTurn();
            if (run.signal?.aborted) throw new StepInterruptedError(step);
        }
    } catch (error) {
        throw toFault(error, run.simulation.currentStep);
    }
}
