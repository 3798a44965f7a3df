/**
 * Molar gas constant.
 * Units: kJ / (mol * K)
 */
export const MOLAR_GAS_CONSTANT = 0.00831451;

// One dalton per cubic nanometre, expressed in g/mL
export const DALTON_PER_NM3_IN_G_PER_ML = 1.66054e-3;

/**
 * Largest number of integration steps handed to the engine in one call.
 * Interrupt signals are only observed between chunks.
 */
export const DEFAULT_CHUNK_SIZE = 10;

// Default convergence threshold for energy minimization, kJ/(mol*nm)
export const DEFAULT_MINIMIZE_TOLERANCE = 10.0;
