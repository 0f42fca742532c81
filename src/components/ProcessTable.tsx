import {
  Table,
  TableBody,
  TableCell,
  TableHead,
  TableHeader,
  TableRow,
} from "@/components/ui/table";
import { Button } from "@/components/ui/button";
import { Trash } from "lucide-react";
import type { ProcessRecord } from "@/types/scheduler";

interface ProcessTableProps {
  processes: ProcessRecord[];
  onRemoveProcess: (index: number) => void;
}

const ProcessTable = ({ processes, onRemoveProcess }: ProcessTableProps) => {
  if (processes.length === 0) {
    return (
      <div className="text-center py-8 text-muted-foreground">
        No processes added yet. Add processes to schedule.
      </div>
    );
  }

  return (
    <div className="overflow-x-auto">
      <Table>
        <TableHeader>
          <TableRow>
            <TableHead>Process</TableHead>
            <TableHead>Arrival Time</TableHead>
            <TableHead>Burst Time</TableHead>
            <TableHead>Priority</TableHead>
            <TableHead className="text-right">Actions</TableHead>
          </TableRow>
        </TableHeader>
        <TableBody>
          {processes.map((process, index) => (
            <TableRow key={`${process.processId}-${index}`}>
              <TableCell>{process.processId}</TableCell>
              <TableCell>{process.arrivalTime}</TableCell>
              <TableCell>{process.burstDuration}</TableCell>
              <TableCell>{process.priority}</TableCell>
              <TableCell className="text-right">
                <Button
                  variant="ghost"
                  size="icon"
                  aria-label={`Remove ${process.processId}`}
                  onClick={() => onRemoveProcess(index)}
                >
                  <Trash className="h-4 w-4" />
                </Button>
              </TableCell>
            </TableRow>
          ))}
        </TableBody>
      </Table>
    </div>
  );
};

export default ProcessTable;
