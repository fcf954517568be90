/**
 * Read records back from a JSON or JSONL export
 */

import * as fs from 'fs';
import { StepArgumentError } from '../errors';
import { Step } from '../step';

/**
 * Parse export content: a JSON array, or one JSON object per line
 */
export function parseSteps(content: string): Step[] {
  const trimmed = content.trim();
  if (trimmed === '') {
    return [];
  }

  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StepArgumentError('content', `Invalid JSON array: ${message}`);
    }
    if (!Array.isArray(parsed)) {
      throw new StepArgumentError('content', 'Expected a JSON array of steps');
    }
    return parsed.map((entry: unknown) => Step.fromJSON(entry));
  }

  // line numbers count every line of the original content, blank ones included
  const steps: Step[] = [];
  content.split('\n').forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }
    try {
      steps.push(Step.fromJSON(JSON.parse(line)));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StepArgumentError('content', `Line ${index + 1}: ${message}`);
    }
  });
  return steps;
}

export async function loadSteps(filePath: string): Promise<Step[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseSteps(content);
}
