/**
 * Environment variable handling for the outreach pipeline
 * All paths come from env vars, with sensible defaults for development
 */

import * as path from 'path';
import * as fs from 'fs';

export interface EnvConfig {
  HOME_DIR: string;
  DATA_DIR: string;
  CONFIG_DIR: string;
  LOG_DIR: string;
  DB_PATH: string;
  NODE_ENV: string;
}

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function getEnvConfig(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const defaultBase = source.HOME || source.USERPROFILE || '/var/lib/outreach-pipeline';
  const homeDir = source.OUTREACH_HOME || path.join(defaultBase, '.outreach-pipeline');

  return {
    HOME_DIR: homeDir,
    DATA_DIR: source.DATA_DIR || path.join(homeDir, 'data'),
    CONFIG_DIR: source.CONFIG_DIR || path.join(homeDir, 'config'),
    LOG_DIR: source.LOG_DIR || path.join(homeDir, 'logs'),
    DB_PATH: source.DB_PATH || path.join(homeDir, 'state.db'),
    NODE_ENV: source.NODE_ENV || 'development',
  };
}

// Directories are created by whoever writes into them first
export const env = getEnvConfig();
