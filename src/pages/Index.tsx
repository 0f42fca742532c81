import { useState } from "react";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import ConfigurationForm from "@/components/ConfigurationForm";
import ProcessTable from "@/components/ProcessTable";
import Timeline from "@/components/Timeline";
import Results from "@/components/Results";
import { schedulerConfig } from "@/config/scheduler";
import type { ProcessRecord, ScheduleMode, ScheduleResult, SchedulingPolicy } from "@/types/scheduler";
import { assignProcessColors } from "@/utils/colors";
import { SchedulerError } from "@/utils/errors";
import { parseProcessCsv } from "@/utils/input";
import { policyLabels, runPolicy } from "@/utils/scheduler";

const autoIdPattern = /^P(\d+)$/;

// Auto-named processes continue after the highest P<n> in the batch, so removing one
// never hands its successor an id that is still in use.
const nextProcessId = (processes: ProcessRecord[]) => {
  const highest = processes.reduce((max, { processId }) => {
    const match = autoIdPattern.exec(processId);
    return match ? Math.max(max, Number(match[1])) : max;
  }, 0);
  return `P${highest + 1}`;
};

const Index = () => {
  const [processes, setProcesses] = useState<ProcessRecord[]>([]);
  const [policy, setPolicy] = useState<SchedulingPolicy>("fcfs");
  const [mode, setMode] = useState<ScheduleMode>(schedulerConfig.mode);
  const [quantum, setQuantum] = useState<number>(schedulerConfig.defaultQuantum);
  const [results, setResults] = useState<ScheduleResult | null>(null);
  const [error, setError] = useState<string | null>(null);

  // Only scheduler failures are shown to the user; anything else is a bug and propagates.
  const withSchedulerErrors = (action: () => void) => {
    try {
      action();
      setError(null);
    } catch (err) {
      if (!(err instanceof SchedulerError)) throw err;
      console.error(`${err.name} (${err.code}): ${err.message}`);
      setError(err.message);
    }
  };

  const handleSchedule = () => {
    withSchedulerErrors(() => {
      setResults(runPolicy(policy, processes, { mode, quantum }));
    });
  };

  const handleLoadCsv = (text: string) => {
    withSchedulerErrors(() => {
      setProcesses(parseProcessCsv(text));
      setResults(null);
    });
  };

  const addProcess = (process: Omit<ProcessRecord, "processId">) => {
    setProcesses([...processes, { ...process, processId: nextProcessId(processes) }]);
  };

  const removeProcess = (index: number) => {
    setProcesses(processes.filter((_, i) => i !== index));
  };

  return (
    <div className="container mx-auto py-8 px-4">
      <h1 className="text-3xl font-bold text-center mb-8">Batch CPU Scheduler</h1>

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-6 mb-8">
        <Card className="lg:col-span-1">
          <CardHeader>
            <CardTitle>Configuration</CardTitle>
          </CardHeader>
          <CardContent>
            <ConfigurationForm
              policy={policy}
              setPolicy={setPolicy}
              mode={mode}
              setMode={setMode}
              quantum={quantum}
              setQuantum={setQuantum}
              onAddProcess={addProcess}
              onLoadCsv={handleLoadCsv}
              onSchedule={handleSchedule}
              processCount={processes.length}
            />
          </CardContent>
        </Card>

        <Card className="lg:col-span-2">
          <CardHeader>
            <CardTitle>Processes</CardTitle>
          </CardHeader>
          <CardContent>
            <ProcessTable processes={processes} onRemoveProcess={removeProcess} />
          </CardContent>
        </Card>
      </div>

      {error && (
        <div role="alert" className="mb-6 rounded-md border border-destructive p-4 text-sm text-destructive">
          {error}
        </div>
      )}

      {results && (
        <Card>
          <CardHeader>
            <CardTitle>
              {policyLabels[results.policy]} ({results.mode})
            </CardTitle>
          </CardHeader>
          <CardContent className="space-y-8">
            <Timeline timelineData={results.timeline} processColors={assignProcessColors(results.order)} />
            <Results results={results} />
          </CardContent>
        </Card>
      )}
    </div>
  );
};

export default Index;
