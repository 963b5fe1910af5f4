export type StepMark = {
  step: string;
  /** Seconds since the run started. */
  seconds: number;
};

/** Wall-clock marks of one negotiation run, exportable as `step,timestamp` CSV. */
export class StepTimeline {
  private readonly startedAt: number;
  private readonly marks: StepMark[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  mark(step: string): StepMark {
    const entry = { step, seconds: (this.now() - this.startedAt) / 1000 };
    this.marks.push(entry);
    return entry;
  }

  get entries(): readonly StepMark[] {
    return this.marks;
  }

  elapsedSeconds(): number {
    return (this.now() - this.startedAt) / 1000;
  }

  toCsv(): string {
    return timelineCsv(this.marks);
  }
}

export function timelineCsv(marks: readonly StepMark[]): string {
  const rows = marks.map((m) => `${m.step},${m.seconds}`);
  return ["step,timestamp", ...rows].join("\n") + "\n";
}
