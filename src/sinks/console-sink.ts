import { StepLogger, consoleLogger } from '../logger';
import { Step } from '../step';
import { StepSink } from './sink';

/**
 * Prints each record's one-line rendering at info level
 */
export class ConsoleStepSink extends StepSink {
  private logger: StepLogger;

  constructor(logger: StepLogger = consoleLogger('Step')) {
    super();
    this.logger = logger;
  }

  onStep(step: Step): void {
    this.logger.info(step.toString());
  }

  async close(): Promise<void> {
    // nothing buffered
  }

  getSinkType(): string {
    return 'ConsoleStepSink';
  }
}
