import { z } from "zod";
import type { ProcessRecord } from "@/types/scheduler";
import {
  DuplicateProcessIdError,
  EmptyBatchError,
  InvalidArrivalError,
  InvalidBurstError,
  InvalidQuantumError,
} from "@/utils/errors";

export const processRecordSchema = z.object({
  processId: z.string().trim().min(1, "process id is required"),
  burstDuration: z.coerce.number().int("burst must be an integer"),
  arrivalTime: z.coerce.number().int("arrival must be an integer"),
  priority: z.coerce.number().int("priority must be an integer").default(0),
});

// Throws before any scheduling work starts; the first offending process wins.
export const validateBatch = (processes: readonly ProcessRecord[], strict = true): void => {
  if (processes.length === 0) {
    throw new EmptyBatchError();
  }

  const seen = new Set<string>();
  for (const process of processes) {
    if (!Number.isInteger(process.burstDuration) || process.burstDuration <= 0) {
      throw new InvalidBurstError(process.processId, process.burstDuration);
    }
    if (!Number.isInteger(process.arrivalTime) || process.arrivalTime < 0) {
      throw new InvalidArrivalError(process.processId, process.arrivalTime);
    }
    if (strict) {
      if (seen.has(process.processId)) {
        throw new DuplicateProcessIdError(process.processId);
      }
      seen.add(process.processId);
    }
  }
};

export const validateQuantum = (quantum: number): void => {
  if (!Number.isInteger(quantum) || quantum <= 0) {
    throw new InvalidQuantumError(quantum);
  }
};
