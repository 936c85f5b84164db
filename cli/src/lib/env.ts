import { DEFAULT_BOTTLENECK_THRESHOLD } from "meeting-notes-core";

export const DEFAULT_MAX_FILES = 4000;

function getPositiveInt(name: string): number | undefined {
  const val = process.env[name];
  if (val) {
    const parsed = Number.parseInt(val, 10);
    if (Number.isFinite(parsed) && parsed > 0) return parsed;
  }
  return undefined;
}

/** True when MEETING_NOTES_LOG_FORMAT asks for JSON log lines. */
export function getLogJson(): boolean {
  return process.env.MEETING_NOTES_LOG_FORMAT?.trim().toLowerCase() === "json";
}

export function getMaxFiles(): number {
  return getPositiveInt("MEETING_NOTES_MAX_FILES") ?? DEFAULT_MAX_FILES;
}

export function getBottleneckThreshold(): number {
  return getPositiveInt("MEETING_NOTES_BOTTLENECK_THRESHOLD") ?? DEFAULT_BOTTLENECK_THRESHOLD;
}
