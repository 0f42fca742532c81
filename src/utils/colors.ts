import type { ProcessRecord } from "@/types/scheduler";

// Define colors for processes
const processColors = [
  "#3b82f6", // blue
  "#ef4444", // red
  "#10b981", // green
  "#f59e0b", // amber
  "#8b5cf6", // violet
  "#ec4899", // pink
  "#6366f1", // indigo
  "#14b8a6", // teal
  "#f97316", // orange
  "#84cc16", // lime
];

export const assignProcessColors = (processes: readonly ProcessRecord[]): Record<string, string> => {
  const colorMap: Record<string, string> = {};
  processes.forEach((process, index) => {
    if (!(process.processId in colorMap)) {
      colorMap[process.processId] = processColors[index % processColors.length];
    }
  });
  return colorMap;
};
