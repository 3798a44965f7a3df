export type Vec3 = [number, number, number];

export type BoxVectors = [Vec3, Vec3, Vec3];

export interface Particle {
	// Mass in daltons. A massless particle is held fixed by the integrator.
	mass: number;
}

export interface HarmonicBond {
	i: number;
	j: number;
	// Equilibrium length in nm
	length: number;
	// Force constant in kJ/(mol*nm^2)
	k: number;
}

/**
 * Static description of the simulated system: what reporters may read while
 * a run is in flight.
 */
export interface SystemDescription {
	particles: Particle[];
	bonds: HarmonicBond[];
	// Edge lengths of an orthorhombic unit cell in nm, or null for a non-periodic system
	box: Vec3 | null;
	removeCenterOfMassMotion?: boolean;
}

/**
 * Which state components a snapshot must carry.
 */
export interface SnapshotRequest {
	positions: boolean;
	velocities: boolean;
	forces: boolean;
	energy: boolean;
	wrapPositions: boolean;
}

/**
 * Immutable view of the system state at one step. Components that were not
 * requested are absent.
 */
export interface Snapshot {
	// Simulated time in ps
	readonly time: number;
	readonly positions?: readonly Vec3[];
	readonly velocities?: readonly Vec3[];
	readonly forces?: readonly Vec3[];
	readonly kineticEnergy?: number;
	readonly potentialEnergy?: number;
	readonly boxVectors: BoxVectors | null;
}
