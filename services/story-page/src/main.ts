/**
 * story-page CLI — renders one comic story to a static HTML file.
 *
 *   story-page --id 108992
 *   story-page --name "Iron Man" --out iron-man.html
 *
 * Exit codes: 0 success, 1 configuration or API failure, 2 usage error.
 */

import { writeFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import {
  ConfigError,
  isApiClientError,
  loadApiConfig,
  ResourceFetcher,
  type ApiClientError,
  type FetchFn
} from '@storypage/api-client';
import { parseCliArgs, UsageError, USAGE, type CliOptions } from './cli';
import { format } from './log';
import { assembleStoryPage } from './page';
import { renderStoryPage } from './render';
import { pickRandomStoryId } from './select';

export interface RunDependencies {
  fetchFn?: FetchFn;
  env?: Readonly<Record<string, string | undefined>>;
  random?: () => number;
}

function describeError(error: ConfigError | ApiClientError): string {
  const kind = error instanceof ConfigError ? 'config' : error.kind;
  return `ERROR (${kind}): ${error.message}`;
}

async function generate(options: CliOptions, deps: RunDependencies): Promise<void> {
  const config = await loadApiConfig({ envFile: options.envFile, env: deps.env });
  const fetcher = new ResourceFetcher(config, { fetchFn: deps.fetchFn });

  const storyId =
    options.selection.kind === 'story'
      ? options.selection.storyId
      : await pickRandomStoryId(fetcher, options.selection.name, deps.random);

  format.info(`Generating HTML for story ${storyId}...`);
  const page = await assembleStoryPage(fetcher, storyId);
  await writeFile(options.outFile, renderStoryPage(page), 'ascii');
  format.success(`Done! Wrote ${options.outFile}`);
}

/** Returns the process exit code; unexpected errors are rethrown. */
export async function run(argv: readonly string[], deps: RunDependencies = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      format.error(error.message);
      format.info(USAGE);
      return 2;
    }
    throw error;
  }

  try {
    await generate(options, deps);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError || isApiClientError(error)) {
      format.error(describeError(error));
      return 1;
    }
    throw error;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      format.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
      process.exitCode = 1;
    }
  );
}
