/**
 * JSONL Step Sink
 *
 * Writes step records to a local JSONL (JSON Lines) file
 */

import * as fs from 'fs';
import * as path from 'path';
import { StepLogger, consoleLogger } from '../logger';
import { Step } from '../step';
import { StepSink } from './sink';

/**
 * JsonlStepSink writes one JSON object per record per line
 */
export class JsonlStepSink extends StepSink {
  private path: string;
  private logger: StepLogger;
  private writeStream: fs.WriteStream | null = null;
  private closed: boolean = false;

  /**
   * @param filePath - Path to the JSONL file (appended to, created if missing)
   * @param logger - Where stream problems are reported
   */
  constructor(filePath: string, logger: StepLogger = consoleLogger('JsonlStepSink')) {
    super();
    this.path = filePath;
    this.logger = logger;

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });

      this.writeStream = fs.createWriteStream(filePath, {
        flags: 'a',
        encoding: 'utf-8',
        autoClose: true,
      });

      this.writeStream.on('error', (error) => {
        if (!this.closed) {
          this.logger.error(`Stream error: ${error.message}`);
        }
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to initialize sink: ${message}`);
      this.writeStream = null;
    }
  }

  onStep(step: Step): void {
    if (this.closed) {
      this.logger.warn('Attempted to write a step after close()');
      return;
    }

    if (!this.writeStream) {
      this.logger.error('Write stream not available');
      return;
    }

    this.writeStream.write(JSON.stringify(step) + '\n');
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;

    if (!this.writeStream || this.writeStream.destroyed) {
      return;
    }

    const stream = this.writeStream;

    return new Promise<void>((resolve, reject) => {
      stream.end((err?: Error | null) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  getSinkType(): string {
    return `JsonlStepSink(${this.path})`;
  }

  getPath(): string {
    return this.path;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
