/**
 * StageRunner - named, reportable units of release work
 *
 * A stage body receives its `Stage` handle and either returns normally
 * (optionally after `ok(detail)`), calls `fail(message)`, or lets a
 * `UserAbort` escape. Failures are reported and re-thrown as `InvalidState`
 * carrying the stage title; `UserAbort` passes through untouched.
 *
 * @module stage
 */

import { createLogger } from '../logger/logger';
import { InvalidState, UserAbort } from './errors';
import type { StageInfo, StageOutcome, StageReporter } from './stage.types';

const logger = createLogger('[Stage] ');

export class Stage implements StageInfo {
  public readonly title: string;
  public readonly description: string;
  public readonly parent: Stage | undefined;
  private readonly reporter: StageReporter;
  private result: StageOutcome | undefined;

  constructor(title: string, description: string, reporter: StageReporter, parent?: Stage) {
    this.title = title;
    this.description = description;
    this.reporter = reporter;
    this.parent = parent;
  }

  get depth(): number {
    return this.parent ? this.parent.depth + 1 : 0;
  }

  /** Outcome recorded so far, if any */
  get outcome(): StageOutcome | undefined {
    return this.result;
  }

  ok(detail: string = ''): void {
    this.result = { status: 'ok', detail };
    this.reporter.ok(this, detail);
  }

  progress(message: string): void {
    this.reporter.progress(this, message);
  }

  fail(message: string): never {
    this.result = { status: 'failed', message };
    this.reporter.failed(this, message);
    throw new InvalidState(message, this.title);
  }

  /** Marks the stage as handed back to a human */
  pause(instruction: string): void {
    this.result = { status: 'paused', instruction };
    this.reporter.paused(this, instruction);
  }
}

export class StageRunner {
  private readonly reporter: StageReporter;

  constructor(reporter: StageReporter = new LoggerStageReporter()) {
    this.reporter = reporter;
  }

  async run<T>(
    title: string,
    description: string,
    body: (stage: Stage) => Promise<T>,
    parent?: Stage,
  ): Promise<T> {
    const stage = new Stage(title, description, this.reporter, parent);
    this.reporter.begin(stage);
    try {
      const value = await body(stage);
      if (!stage.outcome) {
        stage.ok();
      }
      return value;
    } catch (error) {
      if (error instanceof UserAbort) {
        if (stage.outcome?.status !== 'paused') {
          stage.pause(error.instruction);
        }
        throw error;
      }
      if (error instanceof InvalidState) {
        if (stage.outcome?.status !== 'failed') {
          this.reporter.failed(stage, error.message);
        }
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.reporter.failed(stage, message);
      throw error;
    }
  }
}

/**
 * Writes stage events as indented lines through the logger.
 */
export class LoggerStageReporter implements StageReporter {
  begin(stage: StageInfo): void {
    logger.info(`${indent(stage)}${stage.title}: ${stage.description}`);
  }

  progress(stage: StageInfo, message: string): void {
    logger.info(`${indent(stage)}  ... ${message}`);
  }

  ok(stage: StageInfo, detail: string): void {
    logger.info(`${indent(stage)}  OK ${detail}`.trimEnd());
  }

  failed(stage: StageInfo, message: string): void {
    logger.error(`${indent(stage)}  FAILED ${message}`);
  }

  paused(stage: StageInfo, instruction: string): void {
    logger.warn(`${indent(stage)}  PAUSED ${instruction}`);
  }
}

function indent(stage: StageInfo): string {
  return '  '.repeat(stage.depth);
}
