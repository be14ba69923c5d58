// ============================================================
// Shape Scatter - Parameter Prompt
// Asks for the four run parameters; empty or unparseable
// answers take the default, out-of-range answers are clamped.
// ============================================================

import { createInterface } from 'node:readline/promises';
import { PARAMETER_LIMITS } from '@shared/constants';
import type { RunParameters } from '@shared/types';
import { normalizeParameters } from '../engine/parameters';

/** Asks one question and resolves with the raw answer. */
export type Ask = (question: string) => Promise<string>;

export interface ParameterAnswers {
  scale?: string;
  seed?: string;
  duration?: string;
  terminate?: string;
}

/** Turns raw answers into clamped parameters. */
export function parseAnswers(answers: ParameterAnswers): RunParameters {
  return normalizeParameters({
    scale: parseNumber(answers.scale),
    seed: parseNumber(answers.seed),
    duration: parseNumber(answers.duration),
    terminate: parseYesNo(answers.terminate),
  });
}

export async function promptParameters(ask: Ask): Promise<RunParameters> {
  const { SCALE, SEED, DURATION, TERMINATE_DEFAULT } = PARAMETER_LIMITS;

  const scale = await ask(`Scale factor (default is ${SCALE.DEFAULT}): `);
  const seed = await ask(`Random seed (default is ${SEED.DEFAULT}): `);
  const duration = await ask(`Duration in seconds (default is ${DURATION.DEFAULT}): `);
  const terminate = await ask(`Terminate when done (default is ${TERMINATE_DEFAULT ? 'y' : 'n'}): `);

  return parseAnswers({ scale, seed, duration, terminate });
}

/** Prompts on the terminal and closes the readline interface afterwards. */
export async function promptFromTerminal(): Promise<RunParameters> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await promptParameters((question) => rl.question(question));
  } finally {
    rl.close();
  }
}

function parseNumber(raw: string | undefined): number | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function parseYesNo(raw: string | undefined): boolean | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  return /^y(es)?$/i.test(trimmed);
}
