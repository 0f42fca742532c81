export type SchedulingPolicy = "fcfs" | "sjf" | "sjfPriority" | "rr";

// "reference" keeps the legacy arithmetic (stale waiting carry-over, single-pass RR);
// "corrected" recomputes waiting per process and runs quantum-based Round Robin.
export type ScheduleMode = "reference" | "corrected";

export interface ProcessRecord {
  processId: string;
  arrivalTime: number;
  burstDuration: number;
  priority: number;
}

export interface TimelineEntry {
  processId: string;
  start: number;
  stop: number;
}

export interface MetricsRow {
  processId: string;
  priority: number;
  burstDuration: number;
  arrivalTime: number;
  waitingTime: number;
  turnaroundTime: number;
  completionTime: number;
}

export interface ScheduleSummary {
  averageWaitingTime: number;
  averageTurnaroundTime: number;
  throughput: number;
  lastCompletion: number;
}

export interface ScheduleResult {
  policy: SchedulingPolicy;
  mode: ScheduleMode;
  order: ProcessRecord[];
  timeline: TimelineEntry[];
  rows: MetricsRow[];
  summary: ScheduleSummary;
}

export interface ScheduleOptions {
  mode?: ScheduleMode;
  quantum?: number;
  strict?: boolean;
}

export interface OutputSink {
  write(chunk: string): unknown;
}
