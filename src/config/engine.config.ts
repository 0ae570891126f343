import { registerAs } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import {
  EngineConfig,
  validateEngineConfig,
} from '../health/config/engine-config.schema';
import { ConfigurationError } from '../health/errors/health-errors';

export const ENGINE_CONFIG_KEY = 'engine';

/** Resolves to <repo>/config from both src/config and dist/config */
export const DEFAULT_ENGINE_CONFIG_PATH = path.join(
  __dirname,
  '..',
  '..',
  'config',
  'engine.default.json',
);

/**
 * Read an engine configuration JSON file.
 *
 * @throws ConfigurationError if the file is missing or not valid JSON
 */
export function loadEngineConfigFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read engine config ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Engine config ${filePath} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

/**
 * Engine configuration namespace for ConfigModule.
 *
 * ENGINE_CONFIG_PATH overrides the bundled defaults. Validated once at
 * startup so a broken file stops the application before any batch runs.
 */
export default registerAs(
  ENGINE_CONFIG_KEY,
  (): EngineConfig =>
    validateEngineConfig(
      loadEngineConfigFile(
        process.env.ENGINE_CONFIG_PATH ?? DEFAULT_ENGINE_CONFIG_PATH,
      ),
    ),
);
