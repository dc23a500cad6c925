import { parseArgs } from 'util';
import type { CliConfig } from './config.js';
import { errorMessage } from '../errors.js';
import { isBlank } from '../utils.js';

export const USAGE = 'Usage: bellhop-send --title <title> --message <message> [--host <host>]';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface SendArgs {
  title: string;
  message: string;
  host: string;
}

const LONG_FLAGS = ['title', 'message', 'host'];

/** Accept the single-dash spelling (`-title x`) alongside `--title x`. */
function normalizeFlag(arg: string): string {
  const match = /^-([a-z]+)(=.*)?$/.exec(arg);
  return match && LONG_FLAGS.includes(match[1]) ? `-${arg}` : arg;
}

export function parseSendArgs(argv: string[], defaults: CliConfig): SendArgs {
  let values: { title?: string; message?: string; host?: string };
  try {
    ({ values } = parseArgs({
      args: argv.map(normalizeFlag),
      options: {
        title: { type: 'string' },
        message: { type: 'string' },
        host: { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }

  if (isBlank(values.title) || isBlank(values.message)) {
    throw new UsageError('title and message are required');
  }

  return {
    title: values.title ?? '',
    message: values.message ?? '',
    host: values.host || defaults.host,
  };
}
