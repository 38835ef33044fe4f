import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '@/utils/errors';

export interface NodeCredentials {
  rpcUser?: string;
  rpcPassword?: string;
  rpcPort?: number;
}

/**
 * Location of divi.conf for the given platform, mirroring where the node
 * itself looks for it.
 */
export function defaultNodeConfPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): string {
  switch (platform) {
    case 'win32': {
      const appData = env.APPDATA ?? path.join(homeDir, 'AppData', 'Roaming');
      return path.win32.join(appData, 'DIVI', 'divi.conf');
    }
    case 'darwin':
      return path.join(homeDir, 'Library', 'Application Support', 'DIVI', 'divi.conf');
    case 'linux':
      return path.join(homeDir, '.divi', 'divi.conf');
    default:
      throw new ConfigError(`Unsupported platform: ${platform}`);
  }
}

export function parseNodeConf(contents: string): NodeCredentials {
  const credentials: NodeCredentials = {};

  for (const rawLine of contents.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();

    if (key === 'rpcuser') {
      credentials.rpcUser = value;
    } else if (key === 'rpcpassword') {
      credentials.rpcPassword = value;
    } else if (key === 'rpcport') {
      const port = Number(value);
      if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new ConfigError(`Invalid rpcport in node configuration: '${value}'`);
      }
      credentials.rpcPort = port;
    }
  }

  return credentials;
}

/** Reads divi.conf if it exists; a missing file yields no credentials. */
export function readNodeConf(confPath: string): NodeCredentials | undefined {
  if (!fs.existsSync(confPath)) {
    return undefined;
  }
  return parseNodeConf(fs.readFileSync(confPath, 'utf8'));
}
