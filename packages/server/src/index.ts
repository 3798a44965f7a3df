export { parseConfig, loadServerConfig } from './config';
export type { ServerConfig } from './config';
export * from './errors';
export { SimulationContext } from './engine/context';
export { HarmonicBondForce } from './engine/forceField';
export { VerletIntegrator } from './engine/integrator';
export type { DynamicalState, IIntegrator } from './engine/integrator';
export { minimizeSteepestDescent } from './engine/minimizer';
export type { MinimizationResult } from './engine/minimizer';
export type { IPhysicsEngine } from './engine/physicsEngine';
export { ObservableRegistry, systemConstants } from './reporters/observables';
export type { Observable, ObservableFunction, SystemConstants } from './reporters/observables';
export { ReportHub, ReportServer } from './reporters/reportServer';
export type { HubSocket, ReportServerOptions } from './reporters/reportServer';
export { WebReporter } from './reporters/webReporter';
export type { IReportBroadcaster, WebReporterOptions } from './reporters/webReporter';
export { AsyncSimulation } from './simulation/asyncSimulation';
export type { AsyncSimulationOptions, OnComplete } from './simulation/asyncSimulation';
export { planRound, runSteps, runStepsAsync, stepRounds } from './simulation/scheduler';
export type { DueReporter, RoundPlan, StepRun } from './simulation/scheduler';
export { combineRequests } from './simulation/snapshotRequest';
export { Completion, StepFuture, StepGuard } from './simulation/stepGuard';
