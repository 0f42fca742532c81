import {
  Table,
  TableBody,
  TableCell,
  TableHead,
  TableHeader,
  TableRow,
} from "@/components/ui/table";
import type { ScheduleResult } from "@/types/scheduler";

interface ResultsProps {
  results: ScheduleResult;
}

const Results = ({ results }: ResultsProps) => {
  const { rows, summary } = results;

  return (
    <div className="overflow-x-auto">
      <Table>
        <TableHeader>
          <TableRow>
            <TableHead>Process</TableHead>
            <TableHead>Priority</TableHead>
            <TableHead>Burst Time</TableHead>
            <TableHead>Arrival Time</TableHead>
            <TableHead>Waiting Time</TableHead>
            <TableHead>Turnaround Time</TableHead>
            <TableHead>Completion Time</TableHead>
          </TableRow>
        </TableHeader>
        <TableBody>
          {rows.map((row, index) => (
            <TableRow key={`${row.processId}-${index}`}>
              <TableCell>{row.processId}</TableCell>
              <TableCell>{row.priority}</TableCell>
              <TableCell>{row.burstDuration}</TableCell>
              <TableCell>{row.arrivalTime}</TableCell>
              <TableCell
                className={row.waitingTime < 0 ? "text-destructive font-medium" : undefined}
                title={row.waitingTime < 0 ? "Negative waiting time" : undefined}
              >
                {row.waitingTime}
              </TableCell>
              <TableCell>{row.turnaroundTime}</TableCell>
              <TableCell>{row.completionTime}</TableCell>
            </TableRow>
          ))}
        </TableBody>
      </Table>

      <div className="mt-4 text-sm text-muted-foreground">
        <p>Average Waiting Time: {summary.averageWaitingTime.toFixed(2)}</p>
        <p>Average Turnaround Time: {summary.averageTurnaroundTime.toFixed(2)}</p>
        <p>Throughput: {summary.throughput.toFixed(3)}</p>
      </div>
    </div>
  );
};

export default Results;
