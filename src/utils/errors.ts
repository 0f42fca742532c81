export type SchedulerErrorCode =
  | "EMPTY_BATCH"
  | "INVALID_BURST"
  | "INVALID_ARRIVAL"
  | "DUPLICATE_PROCESS_ID"
  | "INVALID_QUANTUM"
  | "PROCESS_PARSE";

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptyBatchError extends SchedulerError {
  constructor() {
    super("EMPTY_BATCH", "Cannot schedule an empty batch of processes");
  }
}

export class InvalidBurstError extends SchedulerError {
  readonly processId: string;

  constructor(processId: string, burstDuration: number) {
    super(
      "INVALID_BURST",
      `Process ${processId} has burst duration ${burstDuration}; expected a positive integer`
    );
    this.processId = processId;
  }
}

export class InvalidArrivalError extends SchedulerError {
  readonly processId: string;

  constructor(processId: string, arrivalTime: number) {
    super(
      "INVALID_ARRIVAL",
      `Process ${processId} has arrival time ${arrivalTime}; expected a non-negative integer`
    );
    this.processId = processId;
  }
}

export class DuplicateProcessIdError extends SchedulerError {
  readonly processId: string;

  constructor(processId: string) {
    super("DUPLICATE_PROCESS_ID", `Process id ${processId} appears more than once in the batch`);
    this.processId = processId;
  }
}

export class InvalidQuantumError extends SchedulerError {
  constructor(quantum: number) {
    super("INVALID_QUANTUM", `Quantum ${quantum} is invalid; expected a positive integer`);
  }
}

export class ProcessParseError extends SchedulerError {
  readonly line: number;

  constructor(line: number, reason: string) {
    super("PROCESS_PARSE", `Line ${line}: ${reason}`);
    this.line = line;
  }
}
