import os from 'node:os';
import path from 'node:path';
import { APP_NAME, CHECKPOINT_FILENAME } from './constants.js';

export function getAppDataDir(
  appName: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  if (platform === 'win32') {
    const base = env.LOCALAPPDATA || env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  const xdgDataHome = env.XDG_DATA_HOME;
  if (xdgDataHome) {
    return path.join(xdgDataHome, appName);
  }

  return path.join(os.homedir(), '.local', 'share', appName);
}

export function resolveCheckpointPath(
  override: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  if (override) {
    return path.resolve(override);
  }
  return path.join(getAppDataDir(APP_NAME, env, platform), CHECKPOINT_FILENAME);
}
