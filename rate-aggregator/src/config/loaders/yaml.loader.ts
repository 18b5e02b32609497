import { readFileSync } from 'fs';

import { Value } from '@sinclair/typebox/value';
import { load } from 'js-yaml';

import { Config, yamlValidationSchema } from '../schema';
import { handleValidationError } from '../utils/validation-error.util';

export function parseConfig(raw: unknown): Config {
  return Value.Parse(yamlValidationSchema, raw ?? {});
}

export function yamlLoader(configPath: string): Config {
  try {
    let yamlContent: string;
    try {
      yamlContent = readFileSync(configPath, 'utf8');
    } catch (error) {
      throw new Error(
        `Failed to read YAML config file at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    let parsedYaml: unknown;
    try {
      parsedYaml = load(yamlContent);
    } catch (error) {
      throw new Error(
        `Failed to parse YAML config file: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    // An empty document means "all defaults"
    if (parsedYaml !== undefined && parsedYaml !== null) {
      if (typeof parsedYaml !== 'object' || Array.isArray(parsedYaml)) {
        throw new Error('YAML config file must contain a mapping at the top level');
      }
    }

    return parseConfig(parsedYaml);
  } catch (error) {
    handleValidationError(error, 'Failed to load YAML configuration');
  }
}
