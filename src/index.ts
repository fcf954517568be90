/**
 * webdriver-step-events - structured step records for browser automation
 */

export { COMMANDS, Cmd, cmdDisplayName, isCmd } from './commands';
export { StepArgumentError } from './errors';
export {
  TimingContext,
  TimingContextOptions,
  NanoClock,
  WallClock,
  getDefaultTimingContext,
  resetDefaultTimingContext,
  formattedNanoTime,
} from './timing';
export { Step, StepType, StepJson, StepIssueJson, STEP_TYPES, isStepType, stepJsonSchema } from './step';
export {
  Describable,
  normalizeElementLocator,
  normalizeByLocator,
  getLocatorFromWebElement,
  getLocatorFromBy,
} from './locator';
export {
  StepRecorder,
  StepRecorderOptions,
  StepArgs,
  StepParam,
  HandleParam,
  ReturnMode,
  createRecorder,
} from './recorder';
export { StepLogger, consoleLogger } from './logger';
export { DEFAULT_STEP_DIR, getStepDir, defaultStepFilePath } from './config';
export * from './sinks';
