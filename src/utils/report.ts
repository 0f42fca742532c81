import type {
  MetricsRow,
  OutputSink,
  ProcessRecord,
  ScheduleOptions,
  ScheduleResult,
  SchedulingPolicy,
  TimelineEntry,
} from "@/types/scheduler";
import { runPolicy } from "@/utils/scheduler";

const IDLE_LABEL = "idle";

const tableHeaders = ["ID", "Priority", "Burst", "Arrival", "Wait", "Turnaround", "Exit"];

const center = (text: string, width: number): string => {
  const left = Math.floor((width - text.length) / 2);
  return " ".repeat(left) + text + " ".repeat(width - text.length - left);
};

export const renderTitle = (sink: OutputSink, title: string): void => {
  sink.write(`${title}\n${"=".repeat(title.length)}\n\n`);
};

interface GanttCell {
  label: string;
  stop: number;
}

// Forward gaps between consecutive entries become idle cells.
const toGanttCells = (timeline: TimelineEntry[]): GanttCell[] => {
  const cells: GanttCell[] = [];
  let previousStop = timeline.length > 0 ? timeline[0].start : 0;

  for (const entry of timeline) {
    if (entry.start > previousStop) {
      cells.push({ label: IDLE_LABEL, stop: entry.start });
    }
    cells.push({ label: entry.processId, stop: entry.stop });
    previousStop = entry.stop;
  }

  return cells;
};

/**
 * Writes the timeline as a row of boxed cells with a time axis underneath. Each axis
 * label ends under the `|` that closes its cell.
 */
export const renderTimeline = (sink: OutputSink, timeline: TimelineEntry[]): void => {
  if (timeline.length === 0) return;

  const cells = toGanttCells(timeline);
  let bar = "|";
  let axis = String(timeline[0].start);

  for (const cell of cells) {
    const stopLabel = String(cell.stop);
    const width = Math.max(cell.label.length, stopLabel.length) + 2;
    bar += `${center(cell.label, width)}|`;

    const labelStart = bar.length - stopLabel.length;
    axis = axis.length < labelStart ? axis.padEnd(labelStart) : `${axis} `;
    axis += stopLabel;
  }

  sink.write(`${bar}\n${axis}\n\n`);
};

const rowCells = (row: MetricsRow): string[] => [
  row.processId,
  String(row.priority),
  String(row.burstDuration),
  String(row.arrivalTime),
  String(row.waitingTime),
  String(row.turnaroundTime),
  String(row.completionTime),
];

export const renderTable = (
  sink: OutputSink,
  rows: MetricsRow[],
  averageWaiting: number,
  averageTurnaround: number,
  throughput: number
): void => {
  const body = rows.map(rowCells);
  const widths = tableHeaders.map((header, column) =>
    Math.max(header.length, ...body.map((cells) => cells[column].length))
  );
  const formatLine = (cells: string[]) =>
    cells.map((cell, column) => cell.padStart(widths[column])).join(" | ");

  const lines = [
    formatLine(tableHeaders),
    widths.map((width) => "-".repeat(width)).join("-+-"),
    ...body.map(formatLine),
    "",
    `Average wait: ${averageWaiting.toFixed(2)}`,
    `Average turnaround: ${averageTurnaround.toFixed(2)}`,
    `Throughput: ${throughput.toFixed(3)}`,
  ];

  sink.write(`${lines.join("\n")}\n`);
};

export const writeScheduleReport = (
  sink: OutputSink,
  title: string,
  result: ScheduleResult
): void => {
  renderTitle(sink, title);
  // Single-pass Round Robin records no slices, so it is reported without a chart.
  renderTimeline(sink, result.timeline);
  renderTable(
    sink,
    result.rows,
    result.summary.averageWaitingTime,
    result.summary.averageTurnaroundTime,
    result.summary.throughput
  );
};

const reportFor =
  (policy: SchedulingPolicy) =>
  (
    sink: OutputSink,
    title: string,
    processes: readonly ProcessRecord[],
    options?: ScheduleOptions
  ): ScheduleResult => {
    // Validation happens inside runPolicy, so nothing is written for a rejected batch.
    const result = runPolicy(policy, processes, options);
    writeScheduleReport(sink, title, result);
    return result;
  };

export const fcfsSchedule = reportFor("fcfs");
export const sjfSchedule = reportFor("sjf");
export const sjfPrioritySchedule = reportFor("sjfPriority");
export const rrSchedule = reportFor("rr");
