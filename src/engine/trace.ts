import type { HandleKind } from "./handles";

export type TraceEvent =
  | {
      type: "issue";
      seq: number;
      handle: number;
      kind: HandleKind;
      label: string;
      waitFor: number[];
    }
  | {
      type: "start";
      seq: number;
      handle: number;
      label: string;
    }
  | {
      type: "signal";
      seq: number;
      handle: number;
      label: string;
    }
  | {
      type: "fail";
      seq: number;
      handle: number;
      label: string;
      error: string;
    }
  | {
      type: "cancel";
      seq: number;
      handle: number;
      label: string;
    }
  | {
      type: "scratch_acquire";
      seq: number;
      owner: string;
    }
  | {
      type: "scratch_release";
      seq: number;
      owner: string;
    }
  | {
      type: "barrier";
      seq: number;
      count: number;
    };

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

export type TraceEventInput = DistributiveOmit<TraceEvent, "seq">;

export class TraceRecorder {
  private readonly events: TraceEvent[] = [];
  private nextSeq = 1;

  record(event: TraceEventInput): number {
    const seq = this.nextSeq++;
    const entry: TraceEvent = { ...event, seq };
    this.events.push(entry);
    return seq;
  }

  snapshot(): TraceEvent[] {
    return this.events.slice();
  }
}
