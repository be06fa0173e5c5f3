import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export const DATA_FILE_ENV = 'DOCKET_FILE';

/** Returns the platform-appropriate default data file path */
export function getDefaultDataPath(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  let dir: string;

  if (platform === 'darwin') {
    dir = join(home, 'Library', 'Application Support', 'docket');
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] || join(home, 'AppData', 'Roaming'), 'docket');
  } else {
    // Linux / other
    dir = join(env['XDG_DATA_HOME'] || join(home, '.local', 'share'), 'docket');
  }

  return join(dir, 'tasks.json');
}

/**
 * Data file location.
 * Priority: --file > DOCKET_FILE > platform default.
 */
export function resolveDataPath(fileFlag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  if (fileFlag) return resolve(fileFlag);
  const fromEnv = env[DATA_FILE_ENV];
  if (fromEnv) return resolve(fromEnv);
  return getDefaultDataPath(process.platform, env);
}
