import { schedulerConfig } from "@/config/scheduler";
import type {
  MetricsRow,
  ProcessRecord,
  ScheduleMode,
  ScheduleOptions,
  ScheduleResult,
  SchedulingPolicy,
  TimelineEntry,
} from "@/types/scheduler";
import { buildMetricsRow, sortByArrival, sortByBurst, summarize } from "@/utils/metrics";
import { validateBatch, validateQuantum } from "@/utils/validation";

export const schedulingPolicies: SchedulingPolicy[] = ["fcfs", "sjf", "sjfPriority", "rr"];

export const policyLabels: Record<SchedulingPolicy, string> = {
  fcfs: "First-Come, First-Served",
  sjf: "Shortest Job First",
  sjfPriority: "Shortest Job First (idle-aware)",
  rr: "Round Robin",
};

interface ResolvedOptions {
  mode: ScheduleMode;
  quantum: number;
  strict: boolean;
}

const resolveOptions = (options: ScheduleOptions = {}): ResolvedOptions => ({
  mode: options.mode ?? schedulerConfig.mode,
  quantum: options.quantum ?? schedulerConfig.defaultQuantum,
  strict: options.strict ?? schedulerConfig.strict,
});

interface SequentialRules {
  // SJF variants never report a negative wait for a process that arrived after time 0.
  clampWaiting: boolean;
  // Let the CPU sit idle until the next process in order has arrived.
  idleUntilArrival: boolean;
}

interface SequentialRun {
  timeline: TimelineEntry[];
  rows: MetricsRow[];
  lastCompletion: number;
}

/**
 * Runs each process to completion in the given order.
 *
 * In "reference" mode a process arriving at time 0 reuses the waiting time computed for
 * the process before it, and the clock only advances by burst lengths, so a timeline
 * entry can stop before `start + burst`. "corrected" mode computes
 * `max(0, clock - arrival)` for every process and moves the clock to `start + burst`.
 */
const runSequential = (
  order: ProcessRecord[],
  mode: ScheduleMode,
  rules: SequentialRules
): SequentialRun => {
  const timeline: TimelineEntry[] = [];
  const rows: MetricsRow[] = [];
  let serviceTime = 0;
  let waitingTime = 0;
  let lastCompletion = 0;

  for (const process of order) {
    if (mode === "corrected") {
      waitingTime = Math.max(0, serviceTime - process.arrivalTime);
    } else {
      if (rules.idleUntilArrival && serviceTime < process.arrivalTime) {
        serviceTime = process.arrivalTime;
      }
      if (process.arrivalTime > 0) {
        waitingTime = serviceTime - process.arrivalTime;
        if (rules.clampWaiting && waitingTime < 0) {
          waitingTime = 0;
        }
      }
    }

    const start = waitingTime + process.arrivalTime;
    const row = buildMetricsRow(process, waitingTime);
    rows.push(row);
    lastCompletion = row.completionTime;

    serviceTime = mode === "corrected" ? start + process.burstDuration : serviceTime + process.burstDuration;
    timeline.push({ processId: process.processId, start, stop: serviceTime });
  }

  return { timeline, rows, lastCompletion };
};

const toResult = (
  policy: SchedulingPolicy,
  mode: ScheduleMode,
  order: ProcessRecord[],
  run: SequentialRun
): ScheduleResult => ({
  policy,
  mode,
  order,
  timeline: run.timeline,
  rows: run.rows,
  summary: summarize(run.rows, run.lastCompletion),
});

export const scheduleFCFS = (
  processes: readonly ProcessRecord[],
  options?: ScheduleOptions
): ScheduleResult => {
  const { mode, strict } = resolveOptions(options);
  validateBatch(processes, strict);

  const order = [...processes];
  return toResult("fcfs", mode, order, runSequential(order, mode, { clampWaiting: false, idleUntilArrival: false }));
};

// The order is chosen once by burst length; readiness is never re-evaluated.
export const scheduleSJF = (
  processes: readonly ProcessRecord[],
  options?: ScheduleOptions
): ScheduleResult => {
  const { mode, strict } = resolveOptions(options);
  validateBatch(processes, strict);

  const order = sortByBurst(processes);
  return toResult("sjf", mode, order, runSequential(order, mode, { clampWaiting: true, idleUntilArrival: false }));
};

export const scheduleSJFPriority = (
  processes: readonly ProcessRecord[],
  options?: ScheduleOptions
): ScheduleResult => {
  const { mode, strict } = resolveOptions(options);
  validateBatch(processes, strict);

  const order = sortByBurst(processes);
  return toResult(
    "sjfPriority",
    mode,
    order,
    runSequential(order, mode, { clampWaiting: true, idleUntilArrival: true })
  );
};

/**
 * Single pass over the burst-sorted batch where every process runs its whole burst in
 * one step. There is no quantum and nothing is requeued, so a short job that arrived
 * late can report a negative waiting time. No timeline entries are produced.
 */
const runSinglePassRoundRobin = (order: ProcessRecord[]): SequentialRun => {
  let currentTime = 0;
  const rows = order.map((process) => {
    currentTime += process.burstDuration;
    const turnaroundTime = currentTime - process.arrivalTime;
    return buildMetricsRow(process, turnaroundTime - process.burstDuration);
  });

  return { timeline: [], rows, lastCompletion: currentTime };
};

interface ReadySlot {
  process: ProcessRecord;
  remaining: number;
  completion: number;
}

const runQuantumRoundRobin = (order: ProcessRecord[], quantum: number): SequentialRun => {
  const slots: ReadySlot[] = order.map((process) => ({
    process,
    remaining: process.burstDuration,
    completion: 0,
  }));
  const ready: ReadySlot[] = [];
  const timeline: TimelineEntry[] = [];
  let currentTime = 0;
  let next = 0;

  const admitArrivals = () => {
    while (next < slots.length && slots[next].process.arrivalTime <= currentTime) {
      ready.push(slots[next]);
      next += 1;
    }
  };

  admitArrivals();
  while (ready.length > 0 || next < slots.length) {
    const slot = ready.shift();
    if (!slot) {
      currentTime = Math.max(currentTime, slots[next].process.arrivalTime);
      admitArrivals();
      continue;
    }

    const slice = Math.min(quantum, slot.remaining);
    timeline.push({ processId: slot.process.processId, start: currentTime, stop: currentTime + slice });
    currentTime += slice;
    slot.remaining -= slice;

    // Newcomers queue ahead of the process that was just preempted.
    admitArrivals();
    if (slot.remaining > 0) {
      ready.push(slot);
    } else {
      slot.completion = currentTime;
    }
  }

  const rows = slots.map(({ process, completion }) =>
    buildMetricsRow(process, completion - process.arrivalTime - process.burstDuration)
  );
  return { timeline, rows, lastCompletion: currentTime };
};

export const scheduleRoundRobin = (
  processes: readonly ProcessRecord[],
  options?: ScheduleOptions
): ScheduleResult => {
  const { mode, quantum, strict } = resolveOptions(options);
  validateBatch(processes, strict);

  if (mode === "reference") {
    const order = sortByBurst(processes);
    return toResult("rr", mode, order, runSinglePassRoundRobin(order));
  }

  validateQuantum(quantum);
  const order = sortByArrival(processes);
  return toResult("rr", mode, order, runQuantumRoundRobin(order, quantum));
};

const schedulers: Record<
  SchedulingPolicy,
  (processes: readonly ProcessRecord[], options?: ScheduleOptions) => ScheduleResult
> = {
  fcfs: scheduleFCFS,
  sjf: scheduleSJF,
  sjfPriority: scheduleSJFPriority,
  rr: scheduleRoundRobin,
};

export const runPolicy = (
  policy: SchedulingPolicy,
  processes: readonly ProcessRecord[],
  options?: ScheduleOptions
): ScheduleResult => {
  const result = schedulers[policy](processes, options);

  if (schedulerConfig.debug) {
    console.debug("Scheduled batch:", {
      policy,
      mode: result.mode,
      processes: result.rows.length,
      slices: result.timeline.length,
      lastCompletion: result.summary.lastCompletion,
    });
  }

  return result;
};
