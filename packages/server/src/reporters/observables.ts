import { DALTON_PER_NM3_IN_G_PER_ML, MOLAR_GAS_CONSTANT } from '@shared/constants';
import type { Snapshot, SystemDescription } from '@shared/types';
import { ConfigurationError } from '../errors';

/**
 * Per-system quantities some observables need, computed once.
 */
export interface SystemConstants {
  degreesOfFreedom: number;
  // Daltons
  totalMass: number;
}

export type ObservableFunction = (snapshot: Snapshot, constants: SystemConstants) => number;

export interface Observable {
  label: string;
  compute: ObservableFunction;
}

export function systemConstants(system: SystemDescription): SystemConstants {
  let degreesOfFreedom = 0;
  let totalMass = 0;
  for (const particle of system.particles) {
    if (particle.mass > 0) degreesOfFreedom += 3;
    totalMass += particle.mass;
  }
  if (system.removeCenterOfMassMotion) degreesOfFreedom -= 3;
  return { degreesOfFreedom, totalMass };
}

function requireEnergy(snapshot: Snapshot): { kinetic: number; potential: number } {
  if (snapshot.kineticEnergy === undefined || snapshot.potentialEnergy === undefined) {
    throw new Error('Snapshot carries no energies');
  }
  return { kinetic: snapshot.kineticEnergy, potential: snapshot.potentialEnergy };
}

function boxVolume(snapshot: Snapshot): number {
  const box = snapshot.boxVectors;
  if (!box) throw new Error('Volume is undefined for a non-periodic system');
  return box[0][0] * box[1][1] * box[2][2];
}

const kineticEnergy: Observable = {
  label: 'Kinetic Energy [kJ/mol]',
  compute: snapshot => requireEnergy(snapshot).kinetic,
};

const potentialEnergy: Observable = {
  label: 'Potential Energy [kJ/mol]',
  compute: snapshot => requireEnergy(snapshot).potential,
};

const totalEnergy: Observable = {
  label: 'Total Energy [kJ/mol]',
  compute: snapshot => {
    const { kinetic, potential } = requireEnergy(snapshot);
    return kinetic + potential;
  },
};

const temperature: Observable = {
  label: 'Temperature [K]',
  compute: (snapshot, constants) =>
    2 * requireEnergy(snapshot).kinetic / (constants.degreesOfFreedom * MOLAR_GAS_CONSTANT),
};

const volume: Observable = {
  label: 'Volume [nm^3]',
  compute: snapshot => boxVolume(snapshot),
};

const density: Observable = {
  label: 'Density [g/mL]',
  compute: (snapshot, constants) => constants.totalMass / boxVolume(snapshot) * DALTON_PER_NM3_IN_G_PER_ML,
};

const BUILT_INS: Array<[Observable, string[]]> = [
  [kineticEnergy, ['KE', 'kinetic', 'kinetic_energy', 'kinetic energy', 'kineticEnergy']],
  [potentialEnergy, ['V', 'potential', 'potential_energy', 'potential energy', 'potentialEnergy']],
  [totalEnergy, ['total', 'total_energy', 'total energy', 'totalEnergy']],
  [temperature, ['T', 'temp', 'temperature']],
  [volume, ['vol', 'volume']],
  [density, ['rho', 'density']],
];

/**
 * Maps observable keys to labelled functions of a snapshot. New kinds are
 * added with `register`; reporters only ever look keys up.
 */
export class ObservableRegistry {
  private readonly observables = new Map<string, Observable>();

  constructor(includeBuiltIns = true) {
    if (!includeBuiltIns) return;
    for (const [observable, keys] of BUILT_INS) {
      for (const key of keys) this.observables.set(key, observable);
    }
  }

  has(key: string): boolean {
    return this.observables.has(key);
  }

  keys(): string[] {
    return [...this.observables.keys()];
  }

  /**
   * Adds an observable under `key`. The label defaults to the key.
   */
  register(key: string, compute: ObservableFunction, label: string = key): void {
    if (key.length === 0) throw new ConfigurationError('Observable key must not be empty');
    this.observables.set(key, { label, compute });
  }

  get(key: string): Observable {
    const observable = this.observables.get(key);
    if (!observable) {
      const valid = this.keys().map(k => `"${k}"`).join(', ');
      throw new ConfigurationError(`"${key}" is not a valid observable. You may choose from ${valid}`);
    }
    return observable;
  }
}
