import { homedir } from 'os';
import path from 'path';
import fs from 'fs/promises';
import { DEFAULT_HOST } from '../notifications/http-client.js';

export interface CliConfig {
  host: string;
}

export function cliConfigPath(homeDir: string = homedir()): string {
  return path.join(homeDir, '.bellhop', 'config.json');
}

/** Read ~/.bellhop/config.json; a missing file means defaults. */
export async function loadCliConfig(homeDir: string = homedir()): Promise<CliConfig> {
  const configPath = cliConfigPath(homeDir);

  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { host: DEFAULT_HOST };
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${configPath}: expected a JSON object`);
  }
  if (!('host' in parsed) || parsed.host === undefined || parsed.host === '') {
    return { host: DEFAULT_HOST };
  }
  if (typeof parsed.host !== 'string') {
    throw new Error(`${configPath}: "host" must be a string`);
  }
  return { host: parsed.host };
}
