export type LogType = "info" | "success" | "error";

const LOG_CLASS: Record<LogType, string> = {
  info: "text-info",
  success: "text-success",
  error: "text-danger",
};

const pad = (value: number) => value.toString().padStart(2, "0");

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export interface ProcessLog {
  (message: string, type?: LogType): void;
}

/** Timestamped lines appended to the process-logs panel. */
export function createProcessLog(element: HTMLElement, now: () => Date = () => new Date()): ProcessLog {
  return (message, type = "info") => {
    const line = element.ownerDocument.createElement("span");
    line.className = LOG_CLASS[type];
    line.textContent = `[${formatClock(now())}] ${message}\n`;
    element.appendChild(line);
    element.scrollTop = element.scrollHeight;
  };
}
