import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, PROVIDER_IDS, type Config, type ProviderId, type ProvidersConfig } from './schema.js';

export const DEFAULT_CONFIG_PATHS = ['./chatbridge.yaml', './chatbridge.yml', './config/chatbridge.yaml'];

export type Environment = Record<string, string | undefined>;

export function tokenVariable(providerId: string): string {
  return `${providerId.toUpperCase()}_TOKEN`;
}

export function loadConfig(configPath?: string, env: Environment = process.env): Config {
  const paths = configPath ? [configPath] : DEFAULT_CONFIG_PATHS;

  for (const path of paths) {
    if (existsSync(path)) {
      const content = readFileSync(path, 'utf-8');
      return parseConfig(content, env);
    }
  }

  if (configPath) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  // Return default config if no file found
  return applyEnvironment(ConfigSchema.parse({}), env);
}

export function parseConfig(content: string, env: Environment = {}): Config {
  const rawConfig: unknown = parseYaml(content) ?? {};
  return applyEnvironment(ConfigSchema.parse(rawConfig), env);
}

/** `<PROVIDER>_TOKEN` variables override tokens from the file. */
export function applyEnvironment(config: Config, env: Environment): Config {
  const providers = { ...config.providers };
  for (const id of PROVIDER_IDS) {
    const token = env[tokenVariable(id)]?.trim();
    if (token) setToken(providers, id, token);
  }
  return { ...config, providers };
}

function setToken<K extends ProviderId>(providers: ProvidersConfig, id: K, token: string): void {
  providers[id] = { ...providers[id], token };
}
