import type { ProcessRecord } from "@/types/scheduler";
import { ProcessParseError } from "@/utils/errors";
import { processRecordSchema } from "@/utils/validation";

const headerIdPattern = /^(process\s*id|id)$/i;

const isNumeric = (cell: string) => cell !== "" && !Number.isNaN(Number(cell));

// A first row only counts as a header when it names the id column or carries no numbers,
// so a typo in the first data row still fails with its line number.
const isHeader = (cells: string[]) =>
  headerIdPattern.test(cells[0]) || !cells.some(isNumeric);

/**
 * Parses `ProcessID,Burst,Arrival[,Priority]` rows. A leading header row, blank lines
 * and surrounding whitespace are ignored; priority defaults to 0.
 */
export const parseProcessCsv = (text: string): ProcessRecord[] => {
  const processes: ProcessRecord[] = [];
  let seenFirstRow = false;

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) return;

    const cells = line.split(",").map((cell) => cell.trim());
    if (!seenFirstRow) {
      seenFirstRow = true;
      if (isHeader(cells)) return;
    }

    if (cells.length < 3 || cells.length > 4) {
      throw new ProcessParseError(index + 1, `expected 3 or 4 fields, got ${cells.length}`);
    }

    const [processId, burstDuration, arrivalTime, priority] = cells;
    const parsed = processRecordSchema.safeParse({
      processId,
      burstDuration: burstDuration || undefined,
      arrivalTime: arrivalTime || undefined,
      priority: priority || undefined,
    });
    if (!parsed.success) {
      throw new ProcessParseError(index + 1, parsed.error.issues.map((issue) => issue.message).join(", "));
    }

    processes.push(parsed.data);
  });

  return processes;
};
