export class SimulationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A stepping operation already owns the engine. */
export class AlreadyBusyError extends SimulationError {
    constructor(operation: string) {
        super(`Cannot ${operation}: this simulation is already engaged in a step.`);
    }
}

export class InvalidCallbackError extends SimulationError {}

/**
 * Raised when the engine or a reporter fails during a round. `step` is the
 * step counter at the time of the failure; progress up to it is kept.
 */
export class SchedulerFault extends SimulationError {
    readonly step: number;

    constructor(step: number, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Stepping failed at step ${step}: ${detail}`, { cause });
        this.step = step;
    }
}

/** The interrupt signal fired between two chunks. */
export class StepInterruptedError extends SimulationError {
    readonly step: number;

    constructor(step: number) {
        super(`Stepping interrupted at step ${step}.`);
        this.step = step;
    }
}

export class ReporterContractError extends SimulationError {}

export class ConfigurationError extends SimulationError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}
