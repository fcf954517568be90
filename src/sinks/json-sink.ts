/**
 * JSON Step Sink
 *
 * Collects every record and writes them as one JSON array on close
 */

import * as fs from 'fs';
import * as path from 'path';
import { StepLogger, consoleLogger } from '../logger';
import { Step } from '../step';
import { StepSink } from './sink';

export class JsonStepSink extends StepSink {
  private path: string;
  private logger: StepLogger;
  private steps: Step[] = [];
  private closed: boolean = false;

  constructor(filePath: string, logger: StepLogger = consoleLogger('JsonStepSink')) {
    super();
    this.path = filePath;
    this.logger = logger;
  }

  onStep(step: Step): void {
    if (this.closed) {
      this.logger.warn('Attempted to write a step after close()');
      return;
    }
    this.steps.push(step);
  }

  /**
   * Records collected so far
   */
  getSteps(): Step[] {
    return [...this.steps];
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    // stays open (records kept) until the file is written
    await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
    await fs.promises.writeFile(this.path, JSON.stringify(this.steps, null, 2), 'utf-8');
    this.closed = true;
    this.logger.info(`Wrote ${this.steps.length} step(s) to ${this.path}`);
  }

  getSinkType(): string {
    return `JsonStepSink(${this.path})`;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
