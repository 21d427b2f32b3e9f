/**
 * Configuration loader
 * Loads and validates configuration from YAML/JSON files
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { env, ensureDir } from '../lib/env';
import { logger } from '../lib/logger';
import { ConfigError } from '../lib/errors';
import { configSchema, OutreachConfig } from './types';

let loadedConfig: OutreachConfig | null = null;

export function defaultConfig(): OutreachConfig {
  return configSchema.parse({});
}

// Validate a parsed document, filling every omitted setting with its default
export function parseConfig(document: unknown, origin = 'config'): OutreachConfig {
  const result = configSchema.safeParse(document ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${origin}: ${issues}`);
  }
  return applyEnvOverrides(result.data);
}

// Identifiers that belong to an account rather than to the repo
function applyEnvOverrides(config: OutreachConfig): OutreachConfig {
  return {
    ...config,
    calling: {
      ...config.calling,
      agentId: config.calling.agentId || process.env.ELEVENLABS_AGENT_ID || '',
      phoneNumberId: config.calling.phoneNumberId || process.env.ELEVENLABS_PHONE_NUMBER_ID || '',
    },
    email: {
      ...config.email,
      fromAddress: config.email.fromAddress || process.env.EMAIL_FROM_ADDRESS || '',
    },
  };
}

export function loadConfig(configPath?: string): OutreachConfig {
  if (loadedConfig && !configPath) {
    return loadedConfig;
  }

  const configFile = configPath || path.join(env.CONFIG_DIR, 'config.yaml');
  const jsonConfigFile = configPath || path.join(env.CONFIG_DIR, 'config.json');

  let document: unknown = {};

  // Try YAML first, then JSON
  if (fs.existsSync(configFile)) {
    logger.info(`Loading config from ${configFile}`);
    const content = fs.readFileSync(configFile, 'utf-8');
    document = configFile.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
  } else if (fs.existsSync(jsonConfigFile)) {
    logger.info(`Loading config from ${jsonConfigFile}`);
    const content = fs.readFileSync(jsonConfigFile, 'utf-8');
    document = JSON.parse(content);
  } else {
    logger.warn(`No config file found, using defaults. Expected at: ${configFile}`);
    // Write default config for reference
    writeDefaultConfig(configFile);
  }

  loadedConfig = parseConfig(document, configFile);
  return loadedConfig;
}

export function writeDefaultConfig(configPath: string): void {
  ensureDir(path.dirname(configPath));
  const content = YAML.stringify(defaultConfig(), { indent: 2 });
  fs.writeFileSync(configPath, content);
  logger.info(`Wrote default config to ${configPath}`);
}

export function getConfig(): OutreachConfig {
  return loadConfig();
}
