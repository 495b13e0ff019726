import { randomUUID } from "node:crypto";

export type SpeakStage = "params_applied" | "synth_start" | "synth_done" | "decoded" | "played";

export type Trace = {
  traceId: string;
  startedAt: number;
  marks: Partial<Record<SpeakStage, number>>;
};

export const createTrace = (traceId?: string): Trace => {
  const id = traceId && traceId.trim() ? traceId.trim() : `spk_${randomUUID().slice(0, 8)}`;
  return { traceId: id, startedAt: Date.now(), marks: {} };
};

export const mark = (trace: Trace, stage: SpeakStage) => {
  trace.marks[stage] = Date.now() - trace.startedAt;
};

export const msSinceStart = (trace: Trace) => Date.now() - trace.startedAt;
