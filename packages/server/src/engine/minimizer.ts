import { vec3 } from 'gl-matrix';
import type { Vec3 } from '@shared/types';
import type { HarmonicBondForce } from './forceField';

export interface MinimizationResult {
    iterations: number;
    initialEnergy: number;
    finalEnergy: number;
    converged: boolean;
}

const INITIAL_STEP = 0.01; // nm
const MIN_STEP = 1e-12;

function largestForceComponent(forces: readonly Vec3[], masses: readonly number[]): number {
    let largest = 0;
    for (let i = 0; i < forces.length; i++) {
        if (masses[i] <= 0) continue;
        for (const component of forces[i]) {
            largest = Math.max(largest, Math.abs(component));
        }
    }
    return largest;
}

/**
 * Steepest descent with an adaptive step. A trial move is only kept when it
 * lowers the energy, so the energy never increases. Massless particles stay
 * where they are.
 *
 * Stops once the largest force component drops below `tolerance`, once the
 * step size underflows, or after `maxIterations` iterations (0 = no cap).
 */
export function minimizeSteepestDescent(
    positions: Vec3[],
    masses: readonly number[],
    forceField: HarmonicBondForce,
    tolerance: number,
    maxIterations: number,
): MinimizationResult {
    let { potentialEnergy, forces } = forceField.evaluate(positions);
    const initialEnergy = potentialEnergy;
    let stepSize = INITIAL_STEP;
    let iterations = 0;

    while (maxIterations === 0 || iterations < maxIterations) {
        const largest = largestForceComponent(forces, masses);
        if (largest < tolerance) {
            return { iterations, initialEnergy, finalEnergy: potentialEnergy, converged: true };
        }
        if (stepSize < MIN_STEP) break;
        iterations++;

        const trial = positions.map((position, i): Vec3 => {
            const moved: Vec3 = [position[0], position[1], position[2]];
            if (masses[i] > 0) {
                vec3.scaleAndAdd(moved, moved, forces[i], stepSize / largest);
            }
            return moved;
        });
        const evaluation = forceField.evaluate(trial);

        if (evaluation.potentialEnergy < potentialEnergy) {
            for (let i = 0; i < positions.length; i++) {
                vec3.copy(positions[i], trial[i]);
            }
            potentialEnergy = evaluation.potentialEnergy;
            forces = evaluation.forces;
            stepSize *= 1.2;
        } else {
            stepSize *= 0.5;
        }
    }

    return {
        iterations,
        initialEnergy,
        finalEnergy: potentialEnergy,
        converged: largestForceComponent(forces, masses) < tolerance,
    };
}
