import { schedulerConfig } from "@/config/scheduler";
import type { TimelineEntry } from "@/types/scheduler";

interface TimelineProps {
  timelineData: TimelineEntry[];
  processColors: Record<string, string>;
}

const MAX_MARKERS = 20;

export const getTimeSteps = (maxTime: number): number[] => {
  if (maxTime <= 0) return [];

  const markerCount = Math.min(MAX_MARKERS, maxTime);
  const step = Math.ceil(maxTime / markerCount);
  const steps: number[] = [];
  for (let i = 0; i <= maxTime; i += step) {
    steps.push(i);
  }
  return steps;
};

const Timeline = ({ timelineData, processColors }: TimelineProps) => {
  const maxTime = timelineData.length > 0 ? Math.max(...timelineData.map((entry) => entry.stop)) : 0;
  const timeSteps = getTimeSteps(maxTime);

  if (schedulerConfig.debug) {
    console.debug("Timeline component received data:", { slices: timelineData.length, maxTime });
  }

  return (
    <div>
      <h3 className="text-lg font-medium mb-3">Timeline</h3>
      {maxTime > 0 ? (
        <div className="w-full overflow-x-auto">
          <div className="space-y-1 pr-4" style={{ minWidth: "600px" }}>
            <div className="relative h-10 bg-gray-100 rounded">
              {timelineData.map((entry, index) => (
                <div
                  key={`${entry.processId}-${index}`}
                  data-testid="timeline-slice"
                  className="absolute top-0 h-full flex items-center justify-center text-xs font-medium text-white overflow-hidden"
                  style={{
                    left: `${(entry.start / maxTime) * 100}%`,
                    width: `${(Math.max(0, entry.stop - entry.start) / maxTime) * 100}%`,
                    backgroundColor: processColors[entry.processId] || "#888",
                    borderLeft: index > 0 ? "1px solid white" : "none",
                  }}
                  title={`${entry.processId}: ${entry.start} - ${entry.stop}`}
                >
                  {entry.processId}
                </div>
              ))}
            </div>
            <div className="relative h-6">
              {timeSteps.map((time) => (
                <div
                  key={time}
                  className="absolute text-xs text-gray-500"
                  style={{
                    left: `${(time / maxTime) * 100}%`,
                    transform: "translateX(-50%)",
                  }}
                >
                  {time}
                </div>
              ))}
            </div>
          </div>
        </div>
      ) : (
        <div className="text-sm text-gray-500">No timeline data available</div>
      )}
    </div>
  );
};

export default Timeline;
