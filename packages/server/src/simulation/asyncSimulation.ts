import { z } from 'zod';
import { DEFAULT_CHUNK_SIZE, DEFAULT_MINIMIZE_TOLERANCE } from '@shared/constants';
import type { Reporter, ReportingSimulation } from '@shared/reporter';
import type { SystemDescription, Vec3 } from '@shared/types';
import { parseConfig } from '../config';
import { SimulationContext } from '../engine/context';
import type { IIntegrator } from '../engine/integrator';
import type { IPhysicsEngine } from '../engine/physicsEngine';
import { AlreadyBusyError, InvalidCallbackError } from '../errors';
import { runSteps, runStepsAsync } from './scheduler';
import type { StepRun } from './scheduler';
import { Completion, StepFuture, StepGuard } from './stepGuard';

export type OnComplete = () => void | Promise<void>;

const optionsSchema = z.object({
    chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    signal: z.instanceof(AbortSignal).optional(),
});

export type AsyncSimulationOptions = z.input<typeof optionsSchema>;

function assertStepCount(steps: number): void {
    if (!Number.isInteger(steps) || steps < 0) {
        throw new RangeError(`Step count must be a non-negative integer, got ${steps}`);
    }
}

function assertCallback(onComplete: OnComplete | undefined): void {
    if (onComplete === undefined) return;
    if (typeof onComplete !== 'function') {
        throw new InvalidCallbackError('onComplete must be callable');
    }
    if (onComplete.length > 0) {
        throw new InvalidCallbackError('onComplete must be callable with 0 arguments');
    }
}

/**
 * A simulation that owns its physics engine and advances it either on the
 * caller's stack (`step`) or in the background (`asyncstep`). At most one
 * stepping operation holds the engine at a time.
 */
export class AsyncSimulation<E extends IPhysicsEngine = IPhysicsEngine> implements ReportingSimulation {
    private readonly engine: E;
    private readonly guard = new StepGuard();
    private readonly reporterList: Reporter[] = [];
    private readonly chunkSize: number;
    private readonly signal: AbortSignal | undefined;
    private stepIndex = 0;
    // The most recent background run; wait() observes it
    private tracked: StepFuture | null = null;

    constructor(engine: E, options: AsyncSimulationOptions = {}) {
        const parsed = parseConfig(optionsSchema, options, 'simulation options');
        this.engine = engine;
        this.chunkSize = parsed.chunkSize;
        this.signal = parsed.signal;
    }

    /**
     * Creates a simulation over a new in-process context for `system`.
     */
    static fromSystem(
        system: SystemDescription,
        integrator: IIntegrator,
        positions: readonly Vec3[],
        options: AsyncSimulationOptions = {},
    ): AsyncSimulation<SimulationContext> {
        return new AsyncSimulation(new SimulationContext(system, integrator, positions), options);
    }

    /** The index of the current time step. */
    get currentStep(): number {
        return this.stepIndex;
    }

    get system(): SystemDescription {
        return this.engine.system;
    }

    get reporters(): readonly Reporter[] {
        return [...this.reporterList];
    }

    addReporter(reporter: Reporter): void {
        this.assertIdle('add a reporter');
        this.reporterList.push(reporter);
    }

    removeReporter(reporter: Reporter): boolean {
        this.assertIdle('remove a reporter');
        const index = this.reporterList.indexOf(reporter);
        if (index < 0) return false;
        this.reporterList.splice(index, 1);
        return true;
    }

    isBusy(): boolean {
        return this.guard.isHeld();
    }

    /**
     * Waits for the most recent asynchronous run, if any.
     * @returns Whether that run had finished when the wait ended.
     */
    wait(timeoutMs?: number): Promise<boolean> {
        if (!this.tracked) return Promise.resolve(true);
        return this.tracked.wait(timeoutMs);
    }

    /**
     * Lends the engine to `fn` while no stepping operation can run.
     */
    withEngine<T>(fn: (engine: E) => T): T {
        if (!this.guard.tryAcquire()) throw new AlreadyBusyError('access the engine');
        try {
            return fn(this.engine);
        } finally {
            this.guard.release();
        }
    }

    /**
     * Performs a local energy minimization on the system.
     * @param tolerance Force threshold in kJ/(mol*nm) at which to stop.
     * @param maxIterations Iteration cap. If this is 0, minimization continues
     * until the results converge without regard to how many iterations it takes.
     */
    minimizeEnergy(tolerance: number = DEFAULT_MINIMIZE_TOLERANCE, maxIterations = 0): void {
        if (!Number.isInteger(maxIterations) || maxIterations < 0) {
            throw new RangeError(`maxIterations must be a non-negative integer, got ${maxIterations}`);
        }
        this.withEngine(engine => engine.minimize(tolerance, maxIterations));
    }

    /**
     * Advances the simulation by integrating a specified number of time steps.
     * Throws AlreadyBusyError instead of waiting when another run holds the engine.
     */
    step(steps: number): void {
        assertStepCount(steps);
        if (!this.guard.tryAcquire()) throw new AlreadyBusyError('step');
        try {
            runSteps(this.createRun(steps));
        } finally {
            this.guard.release();
        }
    }

    /**
     * Nonblocking version of step(). Returns a future that completes once the
     * steps are done. `onComplete` runs after the steps finish, whether they
     * succeeded or not; a promise it returns is awaited before the engine is
     * released.
     *
     * When another run holds the engine, this run is queued behind it and a
     * warning is logged.
     */
    asyncstep(steps: number, onComplete?: OnComplete): StepFuture {
        assertStepCount(steps);
        assertCallback(onComplete);

        let admission: Promise<void> = Promise.resolve();
        if (!this.guard.tryAcquire()) {
            // eslint-disable-next-line no-console
            console.warn('[AsyncSimulation] This simulation cannot execute more than one step at a time. '
                + 'Waiting for the previous call to finish (this might take a while)...');
            admission = this.guard.acquire();
        }

        const completion = new Completion();
        const future = new StepFuture(completion);
        this.tracked = future;
        void this.runInBackground(steps, admission, completion, onComplete);
        return future;
    }

    private async runInBackground(
        steps: number,
        admission: Promise<void>,
        completion: Completion,
        onComplete: OnComplete | undefined,
    ): Promise<void> {
        await admission;
        let fault: { error: unknown } | undefined;
        try {
            await runStepsAsync(this.createRun(steps));
        } catch (error) {
            fault = { error };
        }

        if (onComplete) {
            try {
                await onComplete();
            } catch (error) {
                if (fault) {
                    // eslint-disable-next-line no-console
                    console.error('[AsyncSimulation] onComplete failed after a faulted run:', error);
                } else {
                    fault = { error };
                }
            }
        }

        this.guard.release();
        completion.settle(fault);
    }

    private createRun(steps: number): StepRun {
        return {
            simulation: this,
            engine: this.engine,
            reporters: this.reporters,
            target: this.stepIndex + steps,
            chunkSize: this.chunkSize,
            signal: this.signal,
            commit: (advanced: number) => {
                this.stepIndex += advanced;
            },
        };
    }

    private assertIdle(operation: string): void {
        if (this.guard.isHeld()) throw new AlreadyBusyError(operation);
    }
}
