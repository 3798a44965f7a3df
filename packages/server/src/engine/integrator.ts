import { vec3 } from 'gl-matrix';
import type { Vec3 } from '@shared/types';
import type { HarmonicBondForce } from './forceField';

/**
 * Mutable dynamical state an integrator advances in place.
 */
export interface DynamicalState {
    positions: Vec3[];
    velocities: Vec3[];
    // Forces at the current positions, kept in sync by the integrator
    forces: Vec3[];
    masses: number[];
    time: number;
}

export interface IIntegrator {
    /** Time step in ps */
    readonly stepSize: number;

    /**
     * Advances `state` by `steps` time steps.
     */
    step(state: DynamicalState, forceField: HarmonicBondForce, steps: number): void;
}

/**
 * Velocity Verlet integrator. Massless particles never move.
 */
export class VerletIntegrator implements IIntegrator {
    readonly stepSize: number;

    constructor(stepSize: number) {
        if (!(stepSize > 0)) {
            throw new RangeError(`Step size must be positive, got ${stepSize}`);
        }
        this.stepSize = stepSize;
    }

    step(state: DynamicalState, forceField: HarmonicBondForce, steps: number): void {
        const dt = this.stepSize;
        const { positions, velocities, masses } = state;

        for (let n = 0; n < steps; n++) {
            for (let i = 0; i < positions.length; i++) {
                if (masses[i] <= 0) continue;
                vec3.scaleAndAdd(velocities[i], velocities[i], state.forces[i], 0.5 * dt / masses[i]);
                vec3.scaleAndAdd(positions[i], positions[i], velocities[i], dt);
            }

            state.forces = forceField.evaluate(positions).forces;

            for (let i = 0; i < positions.length; i++) {
                if (masses[i] <= 0) continue;
                vec3.scaleAndAdd(velocities[i], velocities[i], state.forces[i], 0.5 * dt / masses[i]);
            }
            state.time += dt;
        }
    }
}
