/**
 * StepRecorder - wraps driver commands in before/after step records
 */

import { v4 as uuidv4 } from 'uuid';
import { Cmd } from './commands';
import { Describable, getLocatorFromBy, getLocatorFromWebElement } from './locator';
import { StepLogger, consoleLogger } from './logger';
import { StepListener, StepSink } from './sinks/sink';
import { Step, StepType } from './step';
import { TimingContext } from './timing';

/**
 * Element handle or locator object, rendered through the locator normalizer
 */
export interface HandleParam {
  kind: 'element' | 'by';
  value: Describable | string;
}

export type StepParam = string | number | boolean | HandleParam;

/**
 * How to record what a command returned:
 * - "value": primitives become the return value, other objects the return object (default)
 * - "element": an element handle (or a list of them), recorded as By expressions
 */
export type ReturnMode = 'value' | 'element';

export interface StepArgs {
  param1?: StepParam;
  param2?: StepParam;
  returns?: ReturnMode;
}

export interface StepRecorderOptions {
  listeners?: StepListener[];
  /** Counter and markers for this session (default: a fresh context) */
  timing?: TimingContext;
  logger?: StepLogger;
  runId?: string;
}

type StepKind = 'Action' | 'Gather';

function renderParam(param: StepParam | undefined): string | undefined {
  if (param === undefined) {
    return undefined;
  }
  if (typeof param === 'object') {
    return param.kind === 'element'
      ? getLocatorFromWebElement(param.value)
      : getLocatorFromBy(param.value);
  }
  return String(param);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class StepRecorder {
  private listeners: StepListener[];
  private timing: TimingContext;
  private logger: StepLogger;
  private runId: string;
  private stepNumber: number = 0;
  private steps: Step[] = [];

  constructor(options: StepRecorderOptions = {}) {
    this.listeners = [...(options.listeners ?? [])];
    this.timing = options.timing ?? new TimingContext();
    this.logger = options.logger ?? consoleLogger('StepRecorder');
    this.runId = options.runId ?? uuidv4();
  }

  addListener(listener: StepListener): void {
    this.listeners.push(listener);
  }

  removeListener(listener: StepListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  getRunId(): string {
    return this.runId;
  }

  /**
   * Number of the last step started (0 before the first)
   */
  getStepNumber(): number {
    return this.stepNumber;
  }

  /**
   * Every record emitted so far, in order
   */
  getSteps(): Step[] {
    return [...this.steps];
  }

  getTimingContext(): TimingContext {
    return this.timing;
  }

  /**
   * Record a command that changes the page (click, navigate, sendKeys, ...)
   */
  recordAction<T>(cmd: Cmd, fn: () => T | Promise<T>, args: StepArgs = {}): Promise<T> {
    return this.run('Action', cmd, fn, args);
  }

  /**
   * Record a passive query (getText, findElement, isDisplayed, ...)
   */
  recordGather<T>(cmd: Cmd, fn: () => T | Promise<T>, args: StepArgs = {}): Promise<T> {
    return this.run('Gather', cmd, fn, args);
  }

  /**
   * Record a failed test against the current step
   */
  recordFailure(error: unknown): Step {
    const step = new Step('Exception', Math.max(this.stepNumber, 1), 'testFailure', this.timing);
    step.setIssue(toError(error));
    this.emit(step);
    return step;
  }

  /**
   * Close every listener that is a sink. All sinks are tried; the first
   * failure is rethrown afterwards.
   */
  async close(): Promise<void> {
    const sinks = this.listeners.filter(
      (listener): listener is StepSink => listener instanceof StepSink
    );
    const results = await Promise.allSettled(sinks.map((sink) => sink.close()));

    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    for (const failure of failures.slice(1)) {
      this.logger.error(`Sink failed to close: ${toError(failure.reason).message}`);
    }
    if (failures.length > 0) {
      throw failures[0].reason;
    }
  }

  private async run<T>(
    kind: StepKind,
    cmd: Cmd,
    fn: () => T | Promise<T>,
    args: StepArgs
  ): Promise<T> {
    this.stepNumber += 1;
    const stepNumber = this.stepNumber;
    const param1 = renderParam(args.param1);
    const param2 = renderParam(args.param2);

    const before: StepType = kind === 'Action' ? 'BeforeAction' : 'BeforeGather';
    const after: StepType = kind === 'Action' ? 'AfterAction' : 'AfterGather';

    this.emit(new Step(before, stepNumber, cmd, this.timing).setParam1(param1).setParam2(param2));

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      const failure = new Step('Exception', stepNumber, cmd, this.timing)
        .setParam1(param1)
        .setParam2(param2)
        .setIssue(toError(error));
      this.emit(failure);
      throw error;
    }

    const afterStep = new Step(after, stepNumber, cmd, this.timing)
      .setParam1(param1)
      .setParam2(param2);
    this.attachReturn(afterStep, result, args.returns ?? 'value');
    this.emit(afterStep);

    return result;
  }

  private attachReturn(step: Step, result: unknown, mode: ReturnMode): void {
    if (result === undefined || result === null) {
      return;
    }
    if (mode === 'element') {
      if (Array.isArray(result)) {
        const locators = result.map((item: unknown) => getLocatorFromWebElement(String(item)));
        step.setReturnValue(`[${locators.join(', ')}]`);
      } else {
        step.setReturnValue(getLocatorFromWebElement(String(result)));
      }
      return;
    }
    if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') {
      step.setReturnValue(String(result));
      return;
    }
    step.setReturnObject(result);
  }

  private emit(step: Step): void {
    this.steps.push(step);
    for (const listener of this.listeners) {
      try {
        listener.onStep(step);
      } catch (error) {
        this.logger.error(
          `Listener failed on record ${step.getRecordNumber()}: ${toError(error).message}`
        );
      }
    }
  }
}

export function createRecorder(options: StepRecorderOptions = {}): StepRecorder {
  return new StepRecorder(options);
}
