import { vec3 } from 'gl-matrix';
import { MOLAR_GAS_CONSTANT } from '@shared/constants';
import { PRNG } from '@shared/prng';
import type { BoxVectors, Snapshot, SnapshotRequest, SystemDescription, Vec3 } from '@shared/types';
import { HarmonicBondForce } from './forceField';
import type { DynamicalState, IIntegrator } from './integrator';
import { minimizeSteepestDescent } from './minimizer';
import type { MinimizationResult } from './minimizer';
import type { IPhysicsEngine } from './physicsEngine';

const copyVec3 = (v: Vec3): Vec3 => [v[0], v[1], v[2]];

function wrapCoordinate(x: number, length: number): number {
    const wrapped = x - length * Math.floor(x / length);
    // floor can round up to exactly `length` for tiny negative inputs
    return wrapped >= length ? 0 : wrapped;
}

function wrapIntoBox(position: Vec3, box: Vec3): Vec3 {
    return [
        wrapCoordinate(position[0], box[0]),
        wrapCoordinate(position[1], box[1]),
        wrapCoordinate(position[2], box[2]),
    ];
}

const isParticleIndex = (index: number, count: number): boolean =>
    Number.isInteger(index) && index >= 0 && index < count;

/**
 * In-process engine for bonded particle systems: holds the dynamical state
 * and drives an integrator over it.
 */
export class SimulationContext implements IPhysicsEngine {
    readonly system: SystemDescription;
    readonly integrator: IIntegrator;
    private readonly forceField: HarmonicBondForce;
    private readonly state: DynamicalState;

    constructor(system: SystemDescription, integrator: IIntegrator, positions: readonly Vec3[]) {
        if (positions.length !== system.particles.length) {
            throw new RangeError(`Expected ${system.particles.length} positions, got ${positions.length}`);
        }
        for (const bond of system.bonds) {
            if (!isParticleIndex(bond.i, positions.length) || !isParticleIndex(bond.j, positions.length) || bond.i === bond.j) {
                throw new RangeError(`Bond ${bond.i}-${bond.j} does not join two distinct particles`);
            }
        }
        this.system = system;
        this.integrator = integrator;
        this.forceField = new HarmonicBondForce(system.bonds, system.box);

        const copied = positions.map(copyVec3);
        this.state = {
            positions: copied,
            velocities: copied.map((): Vec3 => [0, 0, 0]),
            forces: this.forceField.evaluate(copied).forces,
            masses: system.particles.map(p => p.mass),
            time: 0,
        };
    }

    get time(): number {
        return this.state.time;
    }

    advance(steps: number): void {
        this.integrator.step(this.state, this.forceField, steps);
    }

    minimize(tolerance: number, maxIterations: number): MinimizationResult {
        const result = minimizeSteepestDescent(
            this.state.positions, this.state.masses, this.forceField, tolerance, maxIterations,
        );
        this.state.forces = this.forceField.evaluate(this.state.positions).forces;
        return result;
    }

    hasPeriodicBoundary(): boolean {
        return this.system.box !== null;
    }

    setPositions(positions: readonly Vec3[]): void {
        if (positions.length !== this.state.positions.length) {
            throw new RangeError(`Expected ${this.state.positions.length} positions, got ${positions.length}`);
        }
        this.state.positions = positions.map(copyVec3);
        this.state.forces = this.forceField.evaluate(this.state.positions).forces;
    }

    setVelocities(velocities: readonly Vec3[]): void {
        if (velocities.length !== this.state.velocities.length) {
            throw new RangeError(`Expected ${this.state.velocities.length} velocities, got ${velocities.length}`);
        }
        this.state.velocities = velocities.map(copyVec3);
    }

    /**
     * Draws velocities from the Maxwell-Boltzmann distribution at `temperature`
     * kelvin. Centre-of-mass motion is removed afterwards.
     */
    setVelocitiesToTemperature(temperature: number, seed: number): void {
        const rng = new PRNG(seed);
        const { masses } = this.state;
        const velocities = masses.map((mass): Vec3 => {
            if (mass <= 0) return [0, 0, 0];
            const sigma = Math.sqrt(MOLAR_GAS_CONSTANT * temperature / mass);
            return [rng.nextGaussian() * sigma, rng.nextGaussian() * sigma, rng.nextGaussian() * sigma];
        });

        let totalMass = 0;
        const momentum: Vec3 = [0, 0, 0];
        velocities.forEach((v, i) => {
            if (masses[i] <= 0) return;
            totalMass += masses[i];
            vec3.scaleAndAdd(momentum, momentum, v, masses[i]);
        });
        if (totalMass > 0) {
            velocities.forEach((v, i) => {
                if (masses[i] > 0) vec3.scaleAndAdd(v, v, momentum, -1 / totalMass);
            });
        }
        this.state.velocities = velocities;
    }

    getSnapshot(request: SnapshotRequest): Snapshot {
        const { box } = this.system;
        const boxVectors: BoxVectors | null = box
            ? [[box[0], 0, 0], [0, box[1], 0], [0, 0, box[2]]]
            : null;
        const snapshot: {
            -readonly [K in keyof Snapshot]: Snapshot[K];
        } = { time: this.state.time, boxVectors };

        if (request.positions) {
            snapshot.positions = this.state.positions.map(p =>
                request.wrapPositions && box ? wrapIntoBox(p, box) : copyVec3(p));
        }
        if (request.velocities) {
            snapshot.velocities = this.state.velocities.map(copyVec3);
        }
        if (request.forces) {
            snapshot.forces = this.state.forces.map(copyVec3);
        }
        if (request.energy) {
            snapshot.kineticEnergy = this.kineticEnergy();
            snapshot.potentialEnergy = this.forceField.evaluate(this.state.positions).potentialEnergy;
        }
        return snapshot;
    }

    private kineticEnergy(): number {
        const { velocities, masses } = this.state;
        let energy = 0;
        for (let i = 0; i < velocities.length; i++) {
            if (masses[i] <= 0) continue;
            energy += 0.5 * masses[i] * vec3.squaredLength(velocities[i]);
        }
        return energy;
    }
}
