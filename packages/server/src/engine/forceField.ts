import { vec3 } from 'gl-matrix';
import type { HarmonicBond, Vec3 } from '@shared/types';

export interface ForceEvaluation {
    potentialEnergy: number;
    forces: Vec3[];
}

/**
 * Harmonic bond potential, E = 1/2 k (r - r0)^2, with the minimum-image
 * convention in an orthorhombic periodic box.
 */
export class HarmonicBondForce {
    private readonly bonds: HarmonicBond[];
    private readonly box: Vec3 | null;

    constructor(bonds: HarmonicBond[], box: Vec3 | null) {
        this.bonds = bonds;
        this.box = box;
    }

    /**
     * Vector from `b` to `a`, shortened to the nearest periodic image.
     */
    displacement(out: Vec3, a: Vec3, b: Vec3): Vec3 {
        vec3.subtract(out, a, b);
        if (this.box) {
            for (let axis = 0; axis < 3; axis++) {
                const length = this.box[axis];
                out[axis] -= length * Math.round(out[axis] / length);
            }
        }
        return out;
    }

    evaluate(positions: readonly Vec3[]): ForceEvaluation {
        const forces: Vec3[] = positions.map((): Vec3 => [0, 0, 0]);
        let potentialEnergy = 0;
        const delta: Vec3 = [0, 0, 0];

        for (const bond of this.bonds) {
            this.displacement(delta, positions[bond.i], positions[bond.j]);
            const r = vec3.length(delta);
            const stretch = r - bond.length;
            potentialEnergy += 0.5 * bond.k * stretch * stretch;
            if (r === 0) continue;

            // dE/dr along the bond, pulling i toward j when stretched
            const magnitude = -bond.k * stretch / r;
            vec3.scaleAndAdd(forces[bond.i], forces[bond.i], delta, magnitude);
            vec3.scaleAndAdd(forces[bond.j], forces[bond.j], delta, -magnitude);
        }

        return { potentialEnergy, forces };
    }
}
