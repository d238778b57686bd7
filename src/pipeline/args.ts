/**
 * Tracker Relay — Update Arguments
 *
 *   --dry-run      fetch and probe, publish nothing
 *   --skip-probe   publish the full list only
 *   --top <n>      number of best trackers to keep
 */

import { ConfigError } from '../lib/errors';

export interface UpdateArgs {
  dryRun: boolean;
  skipProbe: boolean;
  topN?: number;
}

export function parseUpdateArgs(args: readonly string[]): UpdateArgs {
  const options: UpdateArgs = {
    dryRun: false,
    skipProbe: false,
  };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--dry-run') {
      options.dryRun = true;
    } else if (args[i] === '--skip-probe') {
      options.skipProbe = true;
    } else if (args[i] === '--top') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError('Invalid arguments', ['--top: expected a positive integer, got nothing']);
      }
      const topN = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
      if (!Number.isInteger(topN) || topN < 1) {
        throw new ConfigError('Invalid arguments', [`--top: expected a positive integer, got ${value}`]);
      }
      options.topN = topN;
      i++;
    }
  }

  return options;
}
