import { join } from 'node:path';
import { homedir } from 'node:os';

const APP_DIR = 'conclave';

type Env = Readonly<Record<string, string | undefined>>;

export function getConfigDir(env: Env = process.env): string {
  return env.XDG_CONFIG_HOME
    ? join(env.XDG_CONFIG_HOME, APP_DIR)
    : join(homedir(), '.config', APP_DIR);
}

export function getDataDir(env: Env = process.env): string {
  return env.XDG_DATA_HOME
    ? join(env.XDG_DATA_HOME, APP_DIR)
    : join(homedir(), '.local', 'share', APP_DIR);
}
