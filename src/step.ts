/**
 * Step - one observation point of one instrumented driver command
 *
 * A before and an after record are created around each command (or a single
 * Exception record when it fails) and handed to every StepListener.
 */

import { z } from 'zod';
import { Cmd, cmdDisplayName } from './commands';
import { StepArgumentError } from './errors';
import { TimingContext, formattedNanoTime, getDefaultTimingContext } from './timing';

export const STEP_TYPES = [
  'BeforeAction',
  'AfterAction',
  'BeforeGather',
  'AfterGather',
  'Exception',
] as const;

export type StepType = (typeof STEP_TYPES)[number];

export function isStepType(value: unknown): value is StepType {
  return typeof value === 'string' && (STEP_TYPES as readonly string[]).includes(value);
}

/**
 * Serialized form of an issue; the stack is kept when the error had one
 */
export interface StepIssueJson {
  name: string;
  message: string;
  stack?: string;
}

/**
 * Serialized form of a Step. The raw return object is never included.
 */
export interface StepJson {
  recordNumber: number;
  stepNumber: number;
  timeStamp: number;
  /** Nanoseconds from the end of the last action to the start of this one */
  timeSinceLastAction?: number;
  /** Nanoseconds from the start to the end of this step */
  timeElapsedStep?: number;
  typeOfLog: StepType;
  cmd: string;
  param1?: string;
  param2?: string;
  returnValue?: string;
  issue?: StepIssueJson;
}

const issueSchema = z.object({
  name: z.string(),
  message: z.string(),
  stack: z.string().optional(),
});

export const stepJsonSchema = z.object({
  recordNumber: z.number().int(),
  stepNumber: z.number().int(),
  timeStamp: z.number().int(),
  timeSinceLastAction: z.number().int().nonnegative().optional(),
  timeElapsedStep: z.number().int().nonnegative().optional(),
  typeOfLog: z.enum(STEP_TYPES),
  // kept as a plain string so exports from a newer command set still load
  cmd: z.string(),
  param1: z.string().optional(),
  param2: z.string().optional(),
  returnValue: z.string().optional(),
  issue: issueSchema.optional(),
});

export class Step {
  private recordNumber: number = -1;
  private stepNumber: number = -1;
  private timeStamp: number = -1;
  private timeSinceLastAction?: number;
  private timeElapsedStep?: number;
  private typeOfLog: StepType;
  private cmd: string;
  private param1?: string;
  private param2?: string;
  private returnValue?: string;
  private returnObject?: unknown;
  private issue?: Error;

  /**
   * Create a record and apply the timing side effects of its type
   *
   * @param typeOfLog - Which observation point this record captures
   * @param stepNumber - Logical step shared by a before/after pair (1-indexed)
   * @param cmd - Instrumented command
   * @param context - Counter and markers to use (default: process-wide context)
   */
  constructor(
    typeOfLog: StepType,
    stepNumber: number,
    cmd: Cmd,
    context: TimingContext = getDefaultTimingContext()
  ) {
    if (!isStepType(typeOfLog)) {
      throw new StepArgumentError('typeOfLog', `Invalid step type: ${String(typeOfLog)}`);
    }
    if (!Number.isInteger(stepNumber)) {
      throw new StepArgumentError('stepNumber', `Invalid step number: ${String(stepNumber)}`);
    }

    this.recordNumber = context.takeRecordNumber();
    this.typeOfLog = typeOfLog;
    this.stepNumber = stepNumber;
    this.cmd = cmd;
    this.timeStamp = context.now();

    switch (typeOfLog) {
      case 'BeforeAction':
        this.timeSinceLastAction = context.markBeginAction(stepNumber);
        context.markBeginStep();
        break;
      case 'AfterAction':
        context.markEndAction();
        this.timeElapsedStep = context.measureStep();
        break;
      case 'BeforeGather':
        context.markBeginStep();
        break;
      case 'AfterGather':
        this.timeElapsedStep = context.measureStep();
        break;
      case 'Exception':
        break;
    }
  }

  /**
   * Rebuild a record from its serialized form. No timing side effects and
   * the record counter is left alone.
   *
   * @throws StepArgumentError if the input does not match the schema
   */
  static fromJSON(input: unknown): Step {
    const parsed = stepJsonSchema.safeParse(input);
    if (!parsed.success) {
      throw new StepArgumentError('json', `Invalid step record: ${parsed.error.message}`, {
        issues: parsed.error.issues,
      });
    }
    const data = parsed.data;

    // a private context keeps the shared counter and markers untouched
    const step = new Step(data.typeOfLog, data.stepNumber, 'testFailure', new TimingContext());
    step
      .setRecordNumber(data.recordNumber)
      .setStepNumber(data.stepNumber)
      .setTimeStamp(data.timeStamp)
      .setTimeSinceLastAction(data.timeSinceLastAction)
      .setTimeElapsedStep(data.timeElapsedStep)
      .setTypeOfLog(data.typeOfLog)
      .setCmd(data.cmd)
      .setParam1(data.param1)
      .setParam2(data.param2)
      .setReturnValue(data.returnValue);

    if (data.issue) {
      const issue = new Error(data.issue.message);
      issue.name = data.issue.name;
      if (data.issue.stack !== undefined) {
        issue.stack = data.issue.stack;
      }
      step.setIssue(issue);
    }
    return step;
  }

  getRecordNumber(): number {
    return this.recordNumber;
  }

  setRecordNumber(recordNumber: number): this {
    this.recordNumber = recordNumber;
    return this;
  }

  getStepNumber(): number {
    return this.stepNumber;
  }

  setStepNumber(stepNumber: number): this {
    this.stepNumber = stepNumber;
    return this;
  }

  getTimeStamp(): number {
    return this.timeStamp;
  }

  setTimeStamp(timeStamp: number): this {
    this.timeStamp = timeStamp;
    return this;
  }

  getTimeSinceLastAction(): number | undefined {
    return this.timeSinceLastAction;
  }

  setTimeSinceLastAction(timeSinceLastAction: number | undefined): this {
    this.timeSinceLastAction = timeSinceLastAction;
    return this;
  }

  getTimeElapsedStep(): number | undefined {
    return this.timeElapsedStep;
  }

  setTimeElapsedStep(timeElapsedStep: number | undefined): this {
    this.timeElapsedStep = timeElapsedStep;
    return this;
  }

  getTypeOfLog(): StepType {
    return this.typeOfLog;
  }

  setTypeOfLog(typeOfLog: StepType): this {
    this.typeOfLog = typeOfLog;
    return this;
  }

  /**
   * Command name; usually a Cmd, but records loaded from an export keep
   * whatever string they carried
   */
  getCmd(): string {
    return this.cmd;
  }

  setCmd(cmd: string): this {
    this.cmd = cmd;
    return this;
  }

  getCmdDisplayName(): string {
    return cmdDisplayName(this.cmd);
  }

  getParam1(): string | undefined {
    return this.param1;
  }

  setParam1(param1: string | undefined): this {
    this.param1 = param1;
    return this;
  }

  getParam2(): string | undefined {
    return this.param2;
  }

  setParam2(param2: string | undefined): this {
    this.param2 = param2;
    return this;
  }

  getReturnValue(): string | undefined {
    return this.returnValue;
  }

  setReturnValue(returnValue: string | undefined): this {
    this.returnValue = returnValue;
    return this;
  }

  /**
   * Live object returned by the command (e.g. an element handle).
   * In-process only; never serialized.
   */
  getReturnObject(): unknown {
    return this.returnObject;
  }

  setReturnObject(returnObject: unknown): this {
    this.returnObject = returnObject;
    return this;
  }

  getIssue(): Error | undefined {
    return this.issue;
  }

  setIssue(issue: Error | undefined): this {
    this.issue = issue;
    return this;
  }

  toJSON(): StepJson {
    const json: StepJson = {
      recordNumber: this.recordNumber,
      stepNumber: this.stepNumber,
      timeStamp: this.timeStamp,
      typeOfLog: this.typeOfLog,
      cmd: this.cmd,
    };

    if (this.timeSinceLastAction !== undefined) json.timeSinceLastAction = this.timeSinceLastAction;
    if (this.timeElapsedStep !== undefined) json.timeElapsedStep = this.timeElapsedStep;
    if (this.param1 !== undefined) json.param1 = this.param1;
    if (this.param2 !== undefined) json.param2 = this.param2;
    if (this.returnValue !== undefined) json.returnValue = this.returnValue;
    if (this.issue) {
      json.issue = { name: this.issue.name, message: this.issue.message };
      if (this.issue.stack !== undefined) json.issue.stack = this.issue.stack;
    }
    return json;
  }

  toString(): string {
    const parts: string[] = [
      `stepno:${this.stepNumber}`,
      `type:${this.typeOfLog}`,
      `timestamp:${this.timeStamp} ms`,
      `cmd:${this.getCmdDisplayName()}`,
    ];

    if (this.param1 !== undefined) parts.push(`param1:${this.param1}`);
    if (this.param2 !== undefined) parts.push(`param2:${this.param2}`);
    if (this.returnValue !== undefined) {
      parts.push(`returned:${this.returnValue}`);
    } else if (this.returnObject !== undefined && this.returnObject !== null) {
      parts.push(`returned:${String(this.returnObject)}`);
    }
    if (this.timeSinceLastAction !== undefined) {
      parts.push(`since last step:${formattedNanoTime(this.timeSinceLastAction)}`);
    }
    if (this.timeElapsedStep !== undefined) {
      parts.push(`executed in:${formattedNanoTime(this.timeElapsedStep)}`);
    }
    if (this.issue) parts.push(`issue:${this.issue.message}`);

    return parts.join(',');
  }
}
