import { describe, it, expect } from "vitest";
import type { ProcessRecord, ScheduleMode, ScheduleResult } from "@/types/scheduler";
import {
  runPolicy,
  scheduleFCFS,
  scheduleRoundRobin,
  scheduleSJF,
  scheduleSJFPriority,
  schedulingPolicies,
} from "@/utils/scheduler";
import {
  DuplicateProcessIdError,
  EmptyBatchError,
  InvalidArrivalError,
  InvalidBurstError,
  InvalidQuantumError,
} from "@/utils/errors";

const batch = (): ProcessRecord[] => [
  { processId: "P1", arrivalTime: 0, burstDuration: 5, priority: 1 },
  { processId: "P2", arrivalTime: 1, burstDuration: 3, priority: 2 },
  { processId: "P3", arrivalTime: 2, burstDuration: 8, priority: 3 },
];

const column = <K extends keyof ScheduleResult["rows"][number]>(result: ScheduleResult, key: K) =>
  result.rows.map((row) => row[key]);

describe("scheduleFCFS", () => {
  it("serves processes in input order", () => {
    const result = scheduleFCFS(batch());

    expect(column(result, "processId")).toEqual(["P1", "P2", "P3"]);
    expect(column(result, "waitingTime")).toEqual([0, 4, 6]);
    expect(column(result, "turnaroundTime")).toEqual([5, 7, 14]);
    expect(column(result, "completionTime")).toEqual([5, 8, 16]);
    expect(result.summary.averageWaitingTime).toBeCloseTo(3.3333, 4);
    expect(result.summary.averageTurnaroundTime).toBeCloseTo(8.6667, 4);
    expect(result.summary.throughput).toBe(0.1875);
    expect(result.timeline).toEqual([
      { processId: "P1", start: 0, stop: 5 },
      { processId: "P2", start: 5, stop: 8 },
      { processId: "P3", start: 8, stop: 16 },
    ]);
  });

  it("carries the previous waiting time over to a process arriving at time 0", () => {
    const processes: ProcessRecord[] = [
      { processId: "A", arrivalTime: 0, burstDuration: 2, priority: 0 },
      { processId: "B", arrivalTime: 5, burstDuration: 3, priority: 0 },
      { processId: "C", arrivalTime: 0, burstDuration: 4, priority: 0 },
    ];

    const result = scheduleFCFS(processes, { mode: "reference" });

    // B is served before it arrives and C inherits B's negative wait.
    expect(column(result, "waitingTime")).toEqual([0, -3, -3]);
    expect(column(result, "completionTime")).toEqual([2, 5, 1]);
    expect(result.summary.lastCompletion).toBe(1);
  });

  it("recomputes waiting per process in corrected mode", () => {
    const processes: ProcessRecord[] = [
      { processId: "A", arrivalTime: 0, burstDuration: 2, priority: 0 },
      { processId: "B", arrivalTime: 5, burstDuration: 3, priority: 0 },
      { processId: "C", arrivalTime: 0, burstDuration: 4, priority: 0 },
    ];

    const result = scheduleFCFS(processes, { mode: "corrected" });

    expect(column(result, "waitingTime")).toEqual([0, 0, 8]);
    expect(column(result, "turnaroundTime")).toEqual([2, 3, 12]);
    expect(column(result, "completionTime")).toEqual([2, 8, 12]);
    expect(result.timeline).toEqual([
      { processId: "A", start: 0, stop: 2 },
      { processId: "B", start: 5, stop: 8 },
      { processId: "C", start: 8, stop: 12 },
    ]);
    expect(result.summary.throughput).toBe(0.25);
  });
});

describe("scheduleSJF", () => {
  it("orders by burst once and clamps negative waits", () => {
    const result = scheduleSJF(batch());

    expect(column(result, "processId")).toEqual(["P2", "P1", "P3"]);
    // P1 arrives at 0 and keeps P2's (clamped) wait of 0.
    expect(column(result, "waitingTime")).toEqual([0, 0, 6]);
    expect(column(result, "turnaroundTime")).toEqual([3, 5, 14]);
    expect(column(result, "completionTime")).toEqual([4, 5, 16]);
    expect(result.summary.averageWaitingTime).toBe(2);
    expect(result.summary.averageTurnaroundTime).toBeCloseTo(7.3333, 4);
    expect(result.summary.throughput).toBe(0.1875);
  });

  it("keeps input order for equal bursts", () => {
    const processes: ProcessRecord[] = [
      { processId: "B", arrivalTime: 0, burstDuration: 4, priority: 0 },
      { processId: "A", arrivalTime: 0, burstDuration: 4, priority: 0 },
      { processId: "C", arrivalTime: 0, burstDuration: 1, priority: 0 },
    ];

    expect(scheduleSJF(processes).order.map((p) => p.processId)).toEqual(["C", "B", "A"]);
  });
});

describe("scheduleSJFPriority", () => {
  it("idles the CPU until the next process arrives", () => {
    const result = scheduleSJFPriority(batch());

    expect(column(result, "processId")).toEqual(["P2", "P1", "P3"]);
    expect(column(result, "waitingTime")).toEqual([0, 0, 7]);
    expect(column(result, "turnaroundTime")).toEqual([3, 5, 15]);
    expect(column(result, "completionTime")).toEqual([4, 5, 17]);
    expect(result.timeline[0]).toEqual({ processId: "P2", start: 1, stop: 4 });
    expect(result.summary.throughput).toBeCloseTo(3 / 17, 10);
  });
});

describe("scheduleRoundRobin", () => {
  it("runs each burst to completion in a single pass", () => {
    const result = scheduleRoundRobin(batch(), { mode: "reference" });

    expect(column(result, "processId")).toEqual(["P2", "P1", "P3"]);
    expect(column(result, "turnaroundTime")).toEqual([2, 8, 14]);
    expect(column(result, "completionTime")).toEqual([3, 8, 16]);
    expect(result.timeline).toEqual([]);
    expect(result.summary.averageTurnaroundTime).toBe(8);
    expect(result.summary.throughput).toBe(0.1875);
  });

  it("reproduces a negative waiting time for a late short job", () => {
    const result = scheduleRoundRobin(batch(), { mode: "reference" });

    expect(column(result, "waitingTime")).toEqual([-1, 3, 6]);
    expect(result.rows[0].waitingTime).toBeLessThan(0);
  });

  it("ignores the quantum in reference mode", () => {
    expect(() => scheduleRoundRobin(batch(), { mode: "reference", quantum: 0 })).not.toThrow();
  });

  it("time-slices with a quantum in corrected mode", () => {
    const result = scheduleRoundRobin(batch(), { mode: "corrected", quantum: 2 });

    expect(column(result, "processId")).toEqual(["P1", "P2", "P3"]);
    expect(column(result, "waitingTime")).toEqual([7, 5, 6]);
    expect(column(result, "turnaroundTime")).toEqual([12, 8, 14]);
    expect(column(result, "completionTime")).toEqual([12, 9, 16]);
    expect(result.timeline).toEqual([
      { processId: "P1", start: 0, stop: 2 },
      { processId: "P2", start: 2, stop: 4 },
      { processId: "P3", start: 4, stop: 6 },
      { processId: "P1", start: 6, stop: 8 },
      { processId: "P2", start: 8, stop: 9 },
      { processId: "P3", start: 9, stop: 11 },
      { processId: "P1", start: 11, stop: 12 },
      { processId: "P3", start: 12, stop: 14 },
      { processId: "P3", start: 14, stop: 16 },
    ]);
    expect(result.summary.averageWaitingTime).toBe(6);
    expect(result.summary.throughput).toBe(0.1875);
  });

  it("jumps to the next arrival when the ready queue is empty", () => {
    const processes: ProcessRecord[] = [
      { processId: "A", arrivalTime: 0, burstDuration: 1, priority: 0 },
      { processId: "B", arrivalTime: 4, burstDuration: 2, priority: 0 },
    ];

    const result = scheduleRoundRobin(processes, { mode: "corrected", quantum: 3 });

    expect(result.timeline).toEqual([
      { processId: "A", start: 0, stop: 1 },
      { processId: "B", start: 4, stop: 6 },
    ]);
    expect(column(result, "waitingTime")).toEqual([0, 0]);
    expect(result.summary.lastCompletion).toBe(6);
  });

  it("rejects a quantum that is not a positive integer", () => {
    expect(() => scheduleRoundRobin(batch(), { mode: "corrected", quantum: 0 })).toThrow(
      InvalidQuantumError
    );
    expect(() => scheduleRoundRobin(batch(), { mode: "corrected", quantum: 1.5 })).toThrow(
      InvalidQuantumError
    );
  });
});

describe("runPolicy", () => {
  const modes: ScheduleMode[] = ["reference", "corrected"];

  for (const policy of schedulingPolicies) {
    for (const mode of modes) {
      it(`keeps the completion and turnaround identities for ${policy} (${mode})`, () => {
        const result = runPolicy(policy, batch(), { mode, quantum: 3 });

        for (const row of result.rows) {
          expect(row.completionTime).toBe(row.arrivalTime + row.waitingTime + row.burstDuration);
          expect(row.turnaroundTime).toBe(row.waitingTime + row.burstDuration);
        }
      });

      it(`is deterministic for ${policy} (${mode})`, () => {
        const first = runPolicy(policy, batch(), { mode, quantum: 3 });
        const second = runPolicy(policy, batch(), { mode, quantum: 3 });

        expect(second.rows).toEqual(first.rows);
        expect(second.summary).toEqual(first.summary);
      });

      it(`leaves the caller's array untouched for ${policy} (${mode})`, () => {
        // Reversed so that both the burst sort and the arrival sort would move something.
        const processes = batch().reverse();
        runPolicy(policy, processes, { mode, quantum: 2 });

        expect(processes).toEqual(batch().reverse());
      });

      it(`gives a lone process no wait for ${policy} (${mode})`, () => {
        const result = runPolicy(
          policy,
          [{ processId: "P1", arrivalTime: 0, burstDuration: 4, priority: 0 }],
          { mode }
        );

        expect(result.rows[0]).toMatchObject({ waitingTime: 0, turnaroundTime: 4, completionTime: 4 });
        expect(result.summary.throughput).toBe(0.25);
      });
    }

    it(`never reports a negative wait for ${policy} in corrected mode`, () => {
      const result = runPolicy(policy, batch(), { mode: "corrected", quantum: 2 });

      for (const row of result.rows) {
        expect(row.waitingTime).toBeGreaterThanOrEqual(0);
      }
    });
  }

  it("rejects an empty batch", () => {
    expect(() => runPolicy("fcfs", [])).toThrow(EmptyBatchError);
  });

  it("rejects a non-positive burst", () => {
    const processes = batch();
    processes[1] = { ...processes[1], burstDuration: 0 };

    expect(() => runPolicy("sjf", processes)).toThrow(InvalidBurstError);
  });

  it("rejects a negative arrival", () => {
    const processes = batch();
    processes[2] = { ...processes[2], arrivalTime: -1 };

    expect(() => runPolicy("rr", processes)).toThrow(InvalidArrivalError);
  });

  it("rejects duplicate ids unless strictness is turned off", () => {
    const processes = batch();
    processes[2] = { ...processes[2], processId: "P1" };

    expect(() => runPolicy("fcfs", processes)).toThrow(DuplicateProcessIdError);
    expect(runPolicy("fcfs", processes, { strict: false }).rows).toHaveLength(3);
  });
});
