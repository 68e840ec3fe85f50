/**
 * Scanline — Run Mode Arguments
 */

import type { RunMode } from './run-coordinator';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: npm run pipeline -- [options]

  (no options)          full run: sweep, scan, write today's note
  --topic <slug>        scan a single topic (must-follow is skipped)
  --preview, --dry-run  run every stage but write nothing to the vault
  --promote-only        only resolve #keep / #good / #bad tags
  --config <path>       configuration file (default: config/pipeline.json)`;

export interface CliOptions {
  mode: RunMode;
  configPath?: string;
  help: boolean;
}

export function parseArgs(args: readonly string[]): CliOptions {
  let topic: string | undefined;
  let preview = false;
  let promoteOnly = false;
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--topic':
      case '--config': {
        const value = args[i + 1];
        if (!value || value.startsWith('--')) {
          throw new UsageError(`${arg} needs a value`);
        }
        if (arg === '--topic') topic = value;
        else configPath = value;
        i++;
        break;
      }
      case '--preview':
      case '--dry-run':
        preview = true;
        break;
      case '--promote-only':
        promoteOnly = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        throw new UsageError(`Unknown option ${arg}`);
    }
  }

  const selected = [topic !== undefined, preview, promoteOnly].filter(Boolean).length;
  if (selected > 1) {
    throw new UsageError('--topic, --preview and --promote-only are mutually exclusive');
  }

  let mode: RunMode = { kind: 'full' };
  if (topic !== undefined) mode = { kind: 'single-topic', slug: topic };
  else if (preview) mode = { kind: 'preview' };
  else if (promoteOnly) mode = { kind: 'promote-only' };

  return { mode, configPath, help };
}
