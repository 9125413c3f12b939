import fs from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { aceConfigSchema, defaultConfig, type AceConfig } from './schema.js';
import { InvalidArgsError } from '../errors.js';
import { getAceRoot } from '../store/ace-root.js';

const CONFIG_CANDIDATES = ['config.yaml', 'config.yml', 'config.json'];

export function resolveConfigPath(repoPath: string, configPath?: string): string {
  if (configPath) {
    return path.resolve(configPath);
  }
  // Default: first existing config in the .ace/ directory
  const aceRoot = getAceRoot(repoPath);
  for (const name of CONFIG_CANDIDATES) {
    const candidate = path.join(aceRoot, name);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return path.join(aceRoot, CONFIG_CANDIDATES[0]);
}

/**
 * Load and validate a config file. YAML is a superset of JSON, so both
 * formats go through the same parser. A missing file yields the defaults.
 */
export function loadConfig(configPath: string): AceConfig {
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }
  const raw = fs.readFileSync(configPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = yaml.parse(raw) ?? {};
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidArgsError(`Failed to parse ${configPath}: ${message}`);
  }

  const result = aceConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgsError(`Invalid config ${configPath}: ${issues}`);
  }
  return result.data;
}

export function loadRepoConfig(repoPath: string, configPath?: string): AceConfig {
  return loadConfig(resolveConfigPath(repoPath, configPath));
}
