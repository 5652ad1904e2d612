import type { StageInfo, StageReporter } from './stage.types';

export type RecordedStageEvent = {
  kind: 'begin' | 'progress' | 'ok' | 'failed' | 'paused';
  title: string;
  depth: number;
  text: string;
};

/**
 * Keeps stage events in memory, for tests and machine-readable output.
 */
export class RecordingStageReporter implements StageReporter {
  readonly events: RecordedStageEvent[] = [];

  begin(stage: StageInfo): void {
    this.record('begin', stage, stage.description);
  }

  progress(stage: StageInfo, message: string): void {
    this.record('progress', stage, message);
  }

  ok(stage: StageInfo, detail: string): void {
    this.record('ok', stage, detail);
  }

  failed(stage: StageInfo, message: string): void {
    this.record('failed', stage, message);
  }

  paused(stage: StageInfo, instruction: string): void {
    this.record('paused', stage, instruction);
  }

  /** Events of one kind, as `title: text` lines */
  lines(kind: RecordedStageEvent['kind']): string[] {
    return this.events
      .filter((event) => event.kind === kind)
      .map((event) => `${event.title}: ${event.text}`);
  }

  private record(kind: RecordedStageEvent['kind'], stage: StageInfo, text: string): void {
    this.events.push({ kind, title: stage.title, depth: stage.depth, text });
  }
}
