import { z } from 'zod';
import type { ReportMessage, ServerToClientMessage } from '@shared/messages';
import type { Reporter, ReportingSimulation, ReportRequest } from '@shared/reporter';
import type { Snapshot } from '@shared/types';
import { parseConfig } from '../config';
import { ObservableRegistry, systemConstants } from './observables';
import type { ObservableFunction, SystemConstants } from './observables';

/**
 * Anything that can deliver messages to connected chart clients.
 */
export interface IReportBroadcaster {
  broadcast(message: ServerToClientMessage): void;
}

const optionsSchema = z.object({
  reportInterval: z.number().int().positive(),
  observables: z
    .union([z.string(), z.array(z.string())])
    .default([])
    .transform(value => (typeof value === 'string' ? [value] : value)),
});

export type WebReporterOptions = z.input<typeof optionsSchema>;

/**
 * Reporter for live plotting of summary statistics in the browser. Every
 * `reportInterval` steps it evaluates its observables and broadcasts them.
 */
export class WebReporter implements Reporter {
  readonly reportInterval: number;
  private readonly broadcaster: IReportBroadcaster;
  private readonly registry: ObservableRegistry;
  private readonly observableKeys: string[] = [];
  private constants: SystemConstants | null = null;

  constructor(broadcaster: IReportBroadcaster, options: WebReporterOptions, registry = new ObservableRegistry()) {
    const parsed = parseConfig(optionsSchema, options, 'web reporter options');
    this.broadcaster = broadcaster;
    this.registry = registry;
    this.reportInterval = parsed.reportInterval;
    for (const key of parsed.observables) {
      this.registerObservable(key);
    }
  }

  get observables(): readonly string[] {
    return [...this.observableKeys];
  }

  /**
   * Adds an observable to the plot. Known keys need no function; a new kind
   * needs `compute`, and `label` names its axis (defaults to the key).
   */
  registerObservable(key: string, compute?: ObservableFunction, label?: string): void {
    if (compute) {
      this.registry.register(key, compute, label);
    }
    // Throws a ConfigurationError listing the valid keys when unknown
    this.registry.get(key);
    this.observableKeys.push(key);
  }

  describeNextReport(simulation: ReportingSimulation): ReportRequest {
    const steps = this.reportInterval - (simulation.currentStep % this.reportInterval);
    return { steps, positions: true, velocities: false, forces: false, energy: true };
  }

  report(simulation: ReportingSimulation, snapshot: Snapshot): void {
    this.broadcaster.broadcast(this.buildMessage(simulation, snapshot));
  }

  buildMessage(simulation: ReportingSimulation, snapshot: Snapshot): ReportMessage {
    this.constants ??= systemConstants(simulation.system);
    const constants = this.constants;
    return {
      type: 'report',
      step: simulation.currentStep,
      time: snapshot.time,
      values: this.observableKeys.map(key => {
        const { label, compute } = this.registry.get(key);
        return { label, value: compute(snapshot, constants) };
      }),
    };
  }
}
