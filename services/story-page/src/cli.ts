import { parseArgs } from 'node:util';
import { DEFAULT_ENV_FILE } from '@storypage/api-client';
import { z } from 'zod';

export const DEFAULT_OUT_FILE = 'out.html';

export const USAGE =
  'Usage: story-page (--name <character> | --id <storyId>) [--out <file>] [--env <file>]';

export type StorySelection =
  | { kind: 'character'; name: string }
  | { kind: 'story'; storyId: number };

export interface CliOptions {
  selection: StorySelection;
  outFile: string;
  envFile: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const CLI_OPTIONS = {
  name: { type: 'string' },
  id: { type: 'string' },
  out: { type: 'string' },
  env: { type: 'string' }
} as const;

const PARSE_CONFIG = { options: CLI_OPTIONS, strict: true, allowPositionals: false } as const;

/** Plain decimal digits only; hex, exponent and unsafe integers are refused. */
const StoryIdSchema = z
  .string()
  .regex(/^\d+$/)
  .transform(Number)
  .refine((id) => Number.isSafeInteger(id) && id > 0);

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({ ...PARSE_CONFIG, args: [...argv] }).values;
  } catch (error: unknown) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function selectionFrom(name: string | undefined, id: string | undefined): StorySelection {
  if (name !== undefined && id !== undefined) {
    throw new UsageError('Use either --name or --id, not both');
  }

  if (id !== undefined) {
    const parsed = StoryIdSchema.safeParse(id.trim());
    if (!parsed.success) {
      throw new UsageError(`--id must be a positive integer, got "${id}"`);
    }
    return { kind: 'story', storyId: parsed.data };
  }

  const trimmed = name?.trim();
  if (!trimmed) {
    throw new UsageError('One of --name or --id is required');
  }
  return { kind: 'character', name: trimmed };
}

/** `--name` and `--id` are mutually exclusive; exactly one is required. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const flags = readFlags(argv);
  return {
    selection: selectionFrom(flags.name, flags.id),
    outFile: flags.out ?? DEFAULT_OUT_FILE,
    envFile: flags.env ?? DEFAULT_ENV_FILE
  };
}
