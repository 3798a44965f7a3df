import { setTimeout as sleep } from 'node:timers/promises';
import type { HarmonicBond, SystemDescription, Vec3 } from '@shared/types';
import { loadServerConfig } from './config';
import { VerletIntegrator } from './engine/integrator';
import { StepInterruptedError } from './errors';
import { ReportServer } from './reporters/reportServer';
import { WebReporter } from './reporters/webReporter';
import { AsyncSimulation } from './simulation/asyncSimulation';

const CHAIN_LENGTH = 16;
const BOND_LENGTH = 0.15; // nm
const BOX_EDGE = 3.0; // nm

function buildChain(): { system: SystemDescription; positions: Vec3[] } {
    const positions: Vec3[] = [];
    for (let i = 0; i < CHAIN_LENGTH; i++) {
        // Start slightly off equilibrium so the minimizer has work to do
        const zigzag = i % 2 === 0 ? 0.02 : -0.02;
        positions.push([0.5 + i * BOND_LENGTH * 1.1, 1.5 + zigzag, 1.5]);
    }
    const bonds: HarmonicBond[] = [];
    for (let i = 0; i + 1 < CHAIN_LENGTH; i++) {
        bonds.push({ i, j: i + 1, length: BOND_LENGTH, k: 1000 });
    }
    return {
        system: {
            particles: positions.map(() => ({ mass: 12.011 })),
            bonds,
            box: [BOX_EDGE, BOX_EDGE, BOX_EDGE],
            removeCenterOfMassMotion: true,
        },
        positions,
    };
}

const batch_interval_ms = 1000 / 10;

async function main() {
    const config = loadServerConfig();
    const interrupt = new AbortController();

    const { system, positions } = buildChain();
    const simulation = AsyncSimulation.fromSystem(system, new VerletIntegrator(0.002), positions, {
        chunkSize: config.chunkSize,
        signal: interrupt.signal,
    });
    simulation.minimizeEnergy();
    simulation.withEngine(context => context.setVelocitiesToTemperature(300, 42));

    const server = new ReportServer({ port: config.port });
    await server.start();
    simulation.addReporter(new WebReporter(server, {
        reportInterval: config.reportInterval,
        observables: ['kineticEnergy', 'potentialEnergy', 'totalEnergy', 'temperature', 'volume', 'density'],
    }));

    let running = true;
    process.on('SIGINT', () => {
        // eslint-disable-next-line no-console
        console.log('[main] Caught interrupt signal, shutting down.');
        running = false;
        interrupt.abort();
    });

    while (running) {
        const future = simulation.asyncstep(config.batchSteps);
        await future.wait();
        if (future.isFaulted() && !(future.fault instanceof StepInterruptedError)) {
            throw future.fault;
        }
        if (running) await sleep(batch_interval_ms);
    }

    // eslint-disable-next-line no-console
    console.log(`[main] Stopped at step ${simulation.currentStep}.`);
    await server.close();
    process.exit(0);
}

main().catch(err => {
    // eslint-disable-next-line no-console
    console.error('[main] Server failed:', err);
    process.exit(1);
});
