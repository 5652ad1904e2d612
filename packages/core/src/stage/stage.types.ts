/**
 * Receives stage lifecycle events. The default implementation writes them
 * through the module logger; tests plug in a recording reporter.
 */
export interface StageReporter {
  begin(stage: StageInfo): void;
  progress(stage: StageInfo, message: string): void;
  ok(stage: StageInfo, detail: string): void;
  failed(stage: StageInfo, message: string): void;
  paused(stage: StageInfo, instruction: string): void;
}

export type StageInfo = {
  title: string;
  description: string;
  /** Nesting depth; 0 for top-level stages */
  depth: number;
};

export type StageOutcome =
  | { status: 'ok'; detail: string }
  | { status: 'failed'; message: string }
  | { status: 'paused'; instruction: string };

export type PollPolicy = {
  /** Maximum number of times the step is evaluated */
  attempts: number;
  /** Wait between attempts unless the step asks for another one */
  intervalMs: number;
};

export type PollStep<T> =
  | { done: true; value: T }
  | { done: false; waitMs?: number };

export type PollOutcome<T> =
  | { status: 'done'; value: T }
  | { status: 'timeout' };

export type Sleep = (ms: number) => Promise<void>;
