// --- Server -> Client Messages ---

export interface ObservableValue {
  label: string;
  value: number;
}

export interface ReportMessage {
  type: 'report';
  step: number;
  // Simulated time in ps
  time: number;
  values: ObservableValue[];
}

/** A union of all possible messages sent FROM the server TO the client. */
export type ServerToClientMessage = ReportMessage;
