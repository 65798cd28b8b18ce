/**
 * Command-line Arguments
 *
 * Flags override the matching environment variables.
 */

import { parseArgs } from 'node:util';
import type { ConfigOverrides, ErrorBucketLayout } from '@poscan/shared';

export const USAGE = `Usage: intake-watcher [options]

Monitor a directory for scanned PO files.

Options:
  --root-directory <dir>   Root housing 'waves', 'wavesfinished' and the error bucket
                           (default: <drive root>/renamescans)
  --tesseract-path <file>  Tesseract executable, skipping discovery
  --tessdata-path <dir>    Directory holding *.traineddata files
  --error-layout <layout>  'nested' (wavesfinished/UncapturedPO) or 'sibling' (waveserrors)
  -h, --help               Show this message
`;

export interface CliArguments {
  help: boolean;
  overrides: ConfigOverrides;
}

function parseLayout(value: string | undefined): ErrorBucketLayout | undefined {
  if (value === undefined) return undefined;
  if (value === 'nested' || value === 'sibling') return value;
  throw new Error(`Invalid --error-layout '${value}', expected 'nested' or 'sibling'`);
}

/**
 * @throws Error on unknown flags or invalid values
 */
export function parseCliArguments(argv: string[]): CliArguments {
  const { values } = parseArgs({
    args: argv,
    options: {
      'root-directory': { type: 'string' },
      // Spelling accepted by earlier releases
      root_directory: { type: 'string' },
      'tesseract-path': { type: 'string' },
      'tessdata-path': { type: 'string' },
      'error-layout': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  const overrides: ConfigOverrides = {};

  const rootDirectory = values['root-directory'] ?? values.root_directory;
  if (rootDirectory) overrides.rootDirectory = rootDirectory;
  if (values['tesseract-path']) overrides.tesseractCmd = values['tesseract-path'];
  if (values['tessdata-path']) overrides.tessdataPath = values['tessdata-path'];

  const layout = parseLayout(values['error-layout']);
  if (layout) overrides.errorBucketLayout = layout;

  return { help: values.help === true, overrides };
}
