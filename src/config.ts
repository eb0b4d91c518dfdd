import * as fs from 'fs';
import * as yaml from 'yaml';
import { GameConfigSchema, type GameConfig } from './types.js';
import { logger } from './logger.js';
import { errorMessage } from './utils.js';

export function parseConfig(raw: unknown): GameConfig {
  // An empty YAML file parses to null; treat it as "all defaults".
  return GameConfigSchema.parse(raw ?? {});
}

export function loadConfig(configPath: string): GameConfig {
  logger.log({ type: 'SYSTEM', content: `Loading configuration from ${configPath}`, metadata: { visibility: 'private' } });

  try {
    const fileContents = fs.readFileSync(configPath, 'utf-8');
    const config = parseConfig(yaml.parse(fileContents));

    logger.log({
      type: 'SYSTEM',
      content: 'Configuration loaded and validated successfully.',
      metadata: { visibility: 'private' },
    });
    return config;
  } catch (error) {
    logger.log({
      type: 'SYSTEM',
      content: `Failed to load config: ${errorMessage(error)}`,
      metadata: { visibility: 'private' },
    });
    throw error;
  }
}
