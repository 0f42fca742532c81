import { useState, type ChangeEvent } from "react";
import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { RadioGroup, RadioGroupItem } from "@/components/ui/radio-group";
import { Separator } from "@/components/ui/separator";
import type { ProcessRecord, ScheduleMode, SchedulingPolicy } from "@/types/scheduler";
import { policyLabels, schedulingPolicies } from "@/utils/scheduler";

interface ConfigurationFormProps {
  policy: SchedulingPolicy;
  setPolicy: (value: SchedulingPolicy) => void;
  mode: ScheduleMode;
  setMode: (value: ScheduleMode) => void;
  quantum: number;
  setQuantum: (value: number) => void;
  onAddProcess: (process: Omit<ProcessRecord, "processId">) => void;
  onLoadCsv: (text: string) => void;
  onSchedule: () => void;
  processCount: number;
}

const isPolicy = (value: string): value is SchedulingPolicy =>
  schedulingPolicies.some((policy) => policy === value);
const isMode = (value: string): value is ScheduleMode => value === "reference" || value === "corrected";

const ConfigurationForm = ({
  policy,
  setPolicy,
  mode,
  setMode,
  quantum,
  setQuantum,
  onAddProcess,
  onLoadCsv,
  onSchedule,
  processCount,
}: ConfigurationFormProps) => {
  const [arrivalTime, setArrivalTime] = useState<number>(0);
  const [burstDuration, setBurstDuration] = useState<number>(1);
  const [priority, setPriority] = useState<number>(0);
  const [csvText, setCsvText] = useState<string>("");

  const quantumEnabled = policy === "rr" && mode === "corrected";

  const handleQuantumChange = (e: ChangeEvent<HTMLInputElement>) => {
    const value = parseInt(e.target.value, 10);
    if (value > 0) {
      setQuantum(value);
    }
  };

  const handleArrivalTimeChange = (e: ChangeEvent<HTMLInputElement>) => {
    const value = parseInt(e.target.value, 10);
    if (value >= 0) {
      setArrivalTime(value);
    }
  };

  const handleBurstDurationChange = (e: ChangeEvent<HTMLInputElement>) => {
    const value = parseInt(e.target.value, 10);
    if (value > 0) {
      setBurstDuration(value);
    }
  };

  const handlePriorityChange = (e: ChangeEvent<HTMLInputElement>) => {
    const value = parseInt(e.target.value, 10);
    if (Number.isInteger(value)) {
      setPriority(value);
    }
  };

  const handleAddProcess = () => {
    onAddProcess({
      arrivalTime,
      burstDuration,
      priority,
    });

    setArrivalTime(0);
    setBurstDuration(1);
    setPriority(0);
  };

  return (
    <div className="space-y-6">
      <div className="space-y-2">
        <Label>Policy</Label>
        <RadioGroup
          value={policy}
          onValueChange={(value) => {
            if (isPolicy(value)) setPolicy(value);
          }}
        >
          {schedulingPolicies.map((value) => (
            <div key={value} className="flex items-center space-x-2">
              <RadioGroupItem value={value} id={`policy-${value}`} />
              <Label htmlFor={`policy-${value}`}>{policyLabels[value]}</Label>
            </div>
          ))}
        </RadioGroup>
      </div>

      <div className="grid grid-cols-2 gap-4">
        <div className="space-y-2">
          <Label>Mode</Label>
          <RadioGroup
            value={mode}
            onValueChange={(value) => {
              if (isMode(value)) setMode(value);
            }}
          >
            <div className="flex items-center space-x-2">
              <RadioGroupItem value="reference" id="mode-reference" />
              <Label htmlFor="mode-reference">Reference</Label>
            </div>
            <div className="flex items-center space-x-2">
              <RadioGroupItem value="corrected" id="mode-corrected" />
              <Label htmlFor="mode-corrected">Corrected</Label>
            </div>
          </RadioGroup>
        </div>
        <div>
          <Label htmlFor="quantum">Quantum</Label>
          <Input
            id="quantum"
            type="number"
            min="1"
            step="1"
            value={quantum}
            disabled={!quantumEnabled}
            onChange={handleQuantumChange}
            className="mt-1"
          />
        </div>
      </div>

      <Separator />

      <div className="space-y-4">
        <h3 className="font-medium">Add Process</h3>
        <div className="grid grid-cols-3 gap-4">
          <div>
            <Label htmlFor="arrival-time">Arrival Time</Label>
            <Input
              id="arrival-time"
              type="number"
              min="0"
              step="1"
              value={arrivalTime}
              onChange={handleArrivalTimeChange}
              className="mt-1"
            />
          </div>
          <div>
            <Label htmlFor="burst-duration">Burst Time</Label>
            <Input
              id="burst-duration"
              type="number"
              min="1"
              step="1"
              value={burstDuration}
              onChange={handleBurstDurationChange}
              className="mt-1"
            />
          </div>
          <div>
            <Label htmlFor="priority">Priority</Label>
            <Input
              id="priority"
              type="number"
              step="1"
              value={priority}
              onChange={handlePriorityChange}
              className="mt-1"
            />
          </div>
        </div>
        <div className="flex justify-end">
          <Button onClick={handleAddProcess}>Add Process</Button>
        </div>
      </div>

      <Separator />

      <div className="space-y-2">
        <Label htmlFor="csv-input">Load CSV (ProcessID,Burst,Arrival,Priority)</Label>
        <textarea
          id="csv-input"
          rows={4}
          value={csvText}
          onChange={(e) => setCsvText(e.target.value)}
          className="flex w-full rounded-md border border-input bg-background px-3 py-2 text-sm font-mono"
        />
        <div className="flex justify-end">
          <Button variant="outline" onClick={() => onLoadCsv(csvText)} disabled={!csvText.trim()}>
            Load
          </Button>
        </div>
      </div>

      <div className="pt-2">
        <Button onClick={onSchedule} className="w-full" disabled={processCount === 0}>
          Schedule
        </Button>
      </div>
    </div>
  );
};

export default ConfigurationForm;
