import { describe, it, expect } from "vitest";
import { ProcessParseError } from "@/utils/errors";
import { parseProcessCsv } from "@/utils/input";

describe("parseProcessCsv", () => {
  it("reads rows after an optional header", () => {
    const text = ["ProcessID,Burst,Arrival,Priority", "P1,5,0,2", "", "  P2 , 3 , 1 ", ""].join("\n");

    expect(parseProcessCsv(text)).toEqual([
      { processId: "P1", burstDuration: 5, arrivalTime: 0, priority: 2 },
      { processId: "P2", burstDuration: 3, arrivalTime: 1, priority: 0 },
    ]);
  });

  it("accepts input without a header and with CRLF line endings", () => {
    expect(parseProcessCsv("A,2,0,1\r\nB,4,3,0")).toEqual([
      { processId: "A", burstDuration: 2, arrivalTime: 0, priority: 1 },
      { processId: "B", burstDuration: 4, arrivalTime: 3, priority: 0 },
    ]);
  });

  it("leaves range checks to the scheduler", () => {
    expect(parseProcessCsv("A,0,-2")).toEqual([
      { processId: "A", burstDuration: 0, arrivalTime: -2, priority: 0 },
    ]);
  });

  it("names the line of a row with the wrong number of fields", () => {
    expect(() => parseProcessCsv("P1,5,0\nP2,3")).toThrow(
      new ProcessParseError(2, "expected 3 or 4 fields, got 2")
    );
  });

  it("rejects fractional values", () => {
    expect(() => parseProcessCsv("P1,5,0\nP2,2.5,1")).toThrow("Line 2: burst must be an integer");
  });

  it("reports a malformed first row instead of skipping it as a header", () => {
    expect(() => parseProcessCsv("P1,five,0\nP2,3,1")).toThrow(
      new ProcessParseError(1, "Expected number, received nan")
    );
  });

  it("skips a header that names the id column differently", () => {
    expect(parseProcessCsv("id,burst,arrival\nP1,5,0")).toEqual([
      { processId: "P1", burstDuration: 5, arrivalTime: 0, priority: 0 },
    ]);
  });

  it("rejects a missing process id", () => {
    expect(() => parseProcessCsv("P1,5,0\n,3,1")).toThrow("Line 2: process id is required");
  });
});
