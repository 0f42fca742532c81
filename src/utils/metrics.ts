import type { MetricsRow, ProcessRecord, ScheduleSummary } from "@/types/scheduler";

export const buildMetricsRow = (
  process: ProcessRecord,
  waitingTime: number
): MetricsRow => ({
  processId: process.processId,
  priority: process.priority,
  burstDuration: process.burstDuration,
  arrivalTime: process.arrivalTime,
  waitingTime,
  turnaroundTime: process.burstDuration + waitingTime,
  completionTime: process.burstDuration + process.arrivalTime + waitingTime,
});

/**
 * Averages waiting and turnaround over the batch. Throughput is measured against
 * `lastCompletion`, which each policy supplies: the completion of the last row it
 * processed, not necessarily the largest one.
 */
export const summarize = (rows: MetricsRow[], lastCompletion: number): ScheduleSummary => {
  const count = rows.length;
  const totalWait = rows.reduce((sum, row) => sum + row.waitingTime, 0);
  const totalTurnaround = rows.reduce((sum, row) => sum + row.turnaroundTime, 0);

  return {
    averageWaitingTime: totalWait / count,
    averageTurnaroundTime: totalTurnaround / count,
    throughput: count / lastCompletion,
    lastCompletion,
  };
};

// Stable: ties keep the caller's order. Returns a new array.
export const sortByBurst = (processes: readonly ProcessRecord[]): ProcessRecord[] =>
  [...processes].sort((a, b) => a.burstDuration - b.burstDuration);

export const sortByArrival = (processes: readonly ProcessRecord[]): ProcessRecord[] =>
  [...processes].sort((a, b) => a.arrivalTime - b.arrivalTime);
