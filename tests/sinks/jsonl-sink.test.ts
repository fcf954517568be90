/**
 * Tests for JsonlStepSink
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonlStepSink } from '../../src/sinks/jsonl-sink';
import { loadSteps } from '../../src/sinks/loader';
import { StepRecorder } from '../../src/recorder';
import { StepSink } from '../../src/sinks/sink';
import { START_MS, createFakeClock, createMockLogger } from '../test-utils';

describe('JsonlStepSink', () => {
  let testDir: string;
  let testFile: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jsonl-sink-'));
    testFile = path.join(testDir, 'nested', 'steps.jsonl');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should create parent directories and write one line per record', async () => {
    const sink = new JsonlStepSink(testFile, createMockLogger());
    const recorder = new StepRecorder({ listeners: [sink], timing: createFakeClock().context });

    await recorder.recordAction('to', () => undefined, { param1: 'https://example.com/login' });
    await recorder.close();

    const lines = fs.readFileSync(testFile, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({
      recordNumber: 1,
      stepNumber: 1,
      timeStamp: START_MS,
      typeOfLog: 'BeforeAction',
      cmd: 'to',
      param1: 'https://example.com/login',
    });
    expect(JSON.parse(lines[1])).toEqual({
      recordNumber: 2,
      stepNumber: 1,
      timeStamp: START_MS,
      timeElapsedStep: 0,
      typeOfLog: 'AfterAction',
      cmd: 'to',
      param1: 'https://example.com/login',
    });
  });

  it('should round-trip records through loadSteps', async () => {
    const sink = new JsonlStepSink(testFile, createMockLogger());
    const recorder = new StepRecorder({ listeners: [sink], timing: createFakeClock().context });

    await recorder.recordGather('getAttribute', () => 'primary', { param1: 'class' });
    await recorder.close();

    const loaded = await loadSteps(testFile);
    expect(loaded.map((step) => step.toString())).toEqual(
      recorder.getSteps().map((step) => step.toString())
    );
  });

  it('should ignore records after close', async () => {
    const logger = createMockLogger();
    const sink = new JsonlStepSink(testFile, logger);
    const recorder = new StepRecorder({ listeners: [sink], timing: createFakeClock().context });

    await sink.close();
    await recorder.recordAction('quit', () => undefined);

    expect(sink.isClosed()).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('Attempted to write a step after close()');
    expect(fs.readFileSync(testFile, 'utf-8')).toBe('');
  });

  it('should still be closed by the recorder when an earlier sink fails to close', async () => {
    class FailingSink extends StepSink {
      onStep(): void {
        // drop
      }

      async close(): Promise<void> {
        throw new Error('upload failed');
      }

      getSinkType(): string {
        return 'FailingSink';
      }
    }
    const logger = createMockLogger();
    const sink = new JsonlStepSink(testFile, logger);
    const recorder = new StepRecorder({
      listeners: [new FailingSink(), sink],
      timing: createFakeClock().context,
      logger,
    });

    await recorder.recordAction('click', () => undefined);

    await expect(recorder.close()).rejects.toThrow('upload failed');
    expect(sink.isClosed()).toBe(true);
    expect(fs.readFileSync(testFile, 'utf-8').trim().split('\n')).toHaveLength(2);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should report its type and path', async () => {
    const sink = new JsonlStepSink(testFile, createMockLogger());

    expect(sink.getSinkType()).toBe(`JsonlStepSink(${testFile})`);
    expect(sink.getPath()).toBe(testFile);

    await sink.close();
  });
});
