/**
 * Listener and sink contracts
 */

import { Step } from '../step';

/**
 * Receives every record a StepRecorder emits, in order
 */
export interface StepListener {
  onStep(step: Step): void;
}

/**
 * Listener that externalises records (file, console, ...)
 */
export abstract class StepSink implements StepListener {
  abstract onStep(step: Step): void;

  /**
   * Close the sink and flush buffered data
   */
  abstract close(): Promise<void>;

  /**
   * Get unique identifier for this sink (for debugging)
   */
  abstract getSinkType(): string;
}
