import { describe, it, expect } from 'vitest';
import type { SnapshotRequest, SystemDescription, Vec3 } from '@shared/types';
import { SimulationContext } from '../src/engine/context';
import { HarmonicBondForce } from '../src/engine/forceField';
import { VerletIntegrator } from '../src/engine/integrator';
import { AsyncSimulation } from '../src/simulation/asyncSimulation';

const NOTHING: SnapshotRequest = { positions: false, velocities: false, forces: false, energy: false, wrapPositions: false };
const ENERGY: SnapshotRequest = { ...NOTHING, energy: true };

function dimer(mass0 = 1, box: Vec3 | null = null): SystemDescription {
  return {
    particles: [{ mass: mass0 }, { mass: 1 }],
    bonds: [{ i: 0, j: 1, length: 1, k: 100 }],
    box,
  };
}

function totalEnergy(context: SimulationContext): number {
  const snapshot = context.getSnapshot(ENERGY);
  return (snapshot.kineticEnergy ?? NaN) + (snapshot.potentialEnergy ?? NaN);
}

describe('HarmonicBondForce', () => {
  it('computes the energy and equal, opposite forces of a stretched bond', () => {
    const force = new HarmonicBondForce(dimer().bonds, null);
    const { potentialEnergy, forces } = force.evaluate([[0, 0, 0], [1.5, 0, 0]]);
    expect(potentialEnergy).toBeCloseTo(12.5, 10);
    expect(forces[0][0]).toBeCloseTo(50, 10);
    expect(forces[1][0]).toBeCloseTo(-50, 10);
    expect(forces[0][1]).toBe(0);
  });

  it('measures bonds through the nearest periodic image', () => {
    const force = new HarmonicBondForce([{ i: 0, j: 1, length: 0.2, k: 100 }], [2, 2, 2]);
    const { potentialEnergy } = force.evaluate([[0.1, 0, 0], [1.9, 0, 0]]);
    expect(potentialEnergy).toBeCloseTo(0, 10);
  });
});

describe('SimulationContext', () => {
  it('validates its inputs', () => {
    const integrator = new VerletIntegrator(0.001);
    expect(() => new SimulationContext(dimer(), integrator, [[0, 0, 0]])).toThrow(RangeError);
    const dangling: SystemDescription = { ...dimer(), bonds: [{ i: 0, j: 2, length: 1, k: 1 }] };
    expect(() => new SimulationContext(dangling, integrator, [[0, 0, 0], [1, 0, 0]])).toThrow(RangeError);
    expect(() => new VerletIntegrator(0)).toThrow(RangeError);
  });

  it('leaves out every component that was not requested', () => {
    const context = new SimulationContext(dimer(), new VerletIntegrator(0.001), [[0, 0, 0], [1, 0, 0]]);
    const snapshot = context.getSnapshot(NOTHING);
    expect(snapshot.positions).toBeUndefined();
    expect(snapshot.velocities).toBeUndefined();
    expect(snapshot.forces).toBeUndefined();
    expect(snapshot.kineticEnergy).toBeUndefined();
    expect(snapshot.potentialEnergy).toBeUndefined();
    expect(snapshot.boxVectors).toBeNull();
  });

  it('wraps positions into the unit cell only when asked', () => {
    const system: SystemDescription = { particles: [{ mass: 1 }, { mass: 1 }], bonds: [], box: [2, 2, 2] };
    const context = new SimulationContext(system, new VerletIntegrator(0.001), [[2.5, -0.5, 1], [0.5, 0.5, 0.5]]);
    expect(context.hasPeriodicBoundary()).toBe(true);

    const wrapped = context.getSnapshot({ ...NOTHING, positions: true, wrapPositions: true });
    expect(wrapped.positions).toEqual([[0.5, 1.5, 1], [0.5, 0.5, 0.5]]);
    expect(wrapped.boxVectors).toEqual([[2, 0, 0], [0, 2, 0], [0, 0, 2]]);

    const raw = context.getSnapshot({ ...NOTHING, positions: true });
    expect(raw.positions).toEqual([[2.5, -0.5, 1], [0.5, 0.5, 0.5]]);
  });

  it('conserves energy under velocity Verlet and advances time', () => {
    const context = new SimulationContext(dimer(), new VerletIntegrator(0.001), [[0, 0, 0], [1.1, 0, 0]]);
    expect(totalEnergy(context)).toBeCloseTo(0.5, 10);
    context.advance(1000);
    expect(totalEnergy(context)).toBeCloseTo(0.5, 2);
    expect(context.time).toBeCloseTo(1, 10);
  });

  it('keeps massless particles in place', () => {
    const context = new SimulationContext(dimer(0), new VerletIntegrator(0.001), [[0, 0, 0], [1.2, 0, 0]]);
    context.advance(50);
    const { positions } = context.getSnapshot({ ...NOTHING, positions: true });
    expect(positions?.[0]).toEqual([0, 0, 0]);
    expect(positions?.[1][0]).not.toBe(1.2);
  });

  it('draws reproducible velocities without net momentum', () => {
    const system: SystemDescription = {
      particles: [{ mass: 12 }, { mass: 16 }, { mass: 1 }, { mass: 0 }],
      bonds: [],
      box: null,
    };
    const positions: Vec3[] = [[0, 0, 0], [1, 0, 0], [0, 1, 0], [0, 0, 1]];
    const a = new SimulationContext(system, new VerletIntegrator(0.001), positions);
    const b = new SimulationContext(system, new VerletIntegrator(0.001), positions);
    a.setVelocitiesToTemperature(300, 7);
    b.setVelocitiesToTemperature(300, 7);

    const velocities = a.getSnapshot({ ...NOTHING, velocities: true }).velocities ?? [];
    expect(velocities).toEqual(b.getSnapshot({ ...NOTHING, velocities: true }).velocities);
    expect(velocities[3]).toEqual([0, 0, 0]);
    for (let axis = 0; axis < 3; axis++) {
      const momentum = velocities.reduce((sum, v, i) => sum + v[axis] * system.particles[i].mass, 0);
      expect(momentum).toBeCloseTo(0, 10);
    }
  });
});

describe('energy minimization', () => {
  it('runs to convergence when maxIterations is 0', () => {
    const simulation = AsyncSimulation.fromSystem(dimer(), new VerletIntegrator(0.001), [[0, 0, 0], [1.5, 0, 0]]);
    const before = simulation.withEngine(context => context.getSnapshot(ENERGY).potentialEnergy ?? NaN);

    simulation.minimizeEnergy(1e-3, 0);

    const after = simulation.withEngine(context => context.getSnapshot(ENERGY).potentialEnergy ?? NaN);
    expect(before).toBeCloseTo(12.5, 10);
    expect(after).toBeLessThanOrEqual(before);
    expect(after).toBeLessThan(1e-6);
  });

  it('stops at the iteration cap without raising the energy', () => {
    const context = new SimulationContext(dimer(), new VerletIntegrator(0.001), [[0, 0, 0], [3, 0, 0]]);
    const result = context.minimize(1e-3, 3);
    expect(result.iterations).toBe(3);
    expect(result.converged).toBe(false);
    expect(result.finalEnergy).toBeLessThan(result.initialEnergy);
  });
});
