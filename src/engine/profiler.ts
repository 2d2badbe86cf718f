/**
 * Pipeline latency report.
 *
 * Enabled per run with the `profile` option, or for every run by setting
 * TABLEFLOW_PROFILE=1. Times are relative to the first operation start.
 */
import { getConfig } from "../config";
import type { CompletionHandle, HandleKind, HandleState } from "./handles";

export type ProfileEntry = {
  label: string;
  kind: HandleKind;
  status: HandleState;
  /** Time spent waiting for dependencies and a free lane. */
  queuedMs: number | null;
  startMs: number | null;
  endMs: number | null;
  durationMs: number | null;
};

export type PipelineProfile = {
  entries: ProfileEntry[];
  /** First start to last end. */
  totalMs: number;
  /** Sum of durations per handle kind. */
  busyMs: Record<HandleKind, number>;
};

export function isProfilingEnabled(): boolean {
  return getConfig().profile;
}

export function buildProfile(handles: readonly CompletionHandle[]): PipelineProfile {
  const starts = handles
    .map((handle) => handle.startedAt)
    .filter((value): value is number => value !== null);
  const origin = starts.length > 0 ? Math.min(...starts) : 0;
  const busyMs: Record<HandleKind, number> = { transfer: 0, invoke: 0, host: 0 };
  let lastEnd = origin;

  const entries = handles.map((handle): ProfileEntry => {
    const { startedAt, endedAt } = handle;
    const duration = handle.durationMs;
    if (duration !== null) busyMs[handle.kind] += duration;
    if (endedAt !== null && startedAt !== null) lastEnd = Math.max(lastEnd, endedAt);
    return {
      label: handle.label,
      kind: handle.kind,
      status: handle.status,
      queuedMs: startedAt === null ? null : startedAt - handle.queuedAt,
      startMs: startedAt === null ? null : startedAt - origin,
      endMs: endedAt === null || startedAt === null ? null : endedAt - origin,
      durationMs: duration,
    };
  });

  return { entries, totalMs: lastEnd - origin, busyMs };
}

const ms = (value: number | null): string =>
  value === null ? "-" : value.toFixed(3);

export function formatProfile(profile: PipelineProfile, title = "pipeline"): string {
  const width = Math.max(5, ...profile.entries.map((entry) => entry.label.length));
  const lines = [
    `=== Profile (${title}) ===`,
    `${"label".padEnd(width)}  ${"kind".padEnd(8)}  ${"start".padStart(10)}  ${"end".padStart(10)}  ${"ms".padStart(10)}  status`,
    "─".repeat(width + 62),
  ];
  for (const entry of profile.entries) {
    lines.push(
      `${entry.label.padEnd(width)}  ${entry.kind.padEnd(8)}  ${ms(entry.startMs).padStart(10)}  ${ms(entry.endMs).padStart(10)}  ${ms(entry.durationMs).padStart(10)}  ${entry.status}`,
    );
  }
  lines.push("─".repeat(width + 62));
  lines.push(
    `total ${ms(profile.totalMs)} ms (transfer ${ms(profile.busyMs.transfer)}, invoke ${ms(profile.busyMs.invoke)}, host ${ms(profile.busyMs.host)})`,
  );
  return lines.join("\n");
}
