import { GatewayConfig } from '@/types/config';
import { ConfigError } from '@/utils/errors';
import { DEFAULT_VALUES } from './constants';
import { defaultNodeConfPath, NodeCredentials, readNodeConf } from './node-conf';
import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';

const numeric = z.union([z.number(), z.string()]).optional();

const YamlConfigSchema = z
  .object({
    server: z
      .object({ port: numeric, host: z.string().optional(), environment: z.string().optional(), log_level: z.string().optional() })
      .optional(),
    rpc: z
      .object({
        user: z.string().optional(),
        password: z.string().optional(),
        host: z.string().optional(),
        port: numeric,
        timeout: numeric,
        conf_path: z.string().optional(),
      })
      .optional(),
    cache: z.object({ peer_ttl_ms: numeric }).optional(),
    peers: z.object({ min_version: z.string().optional(), height_window: numeric }).optional(),
    cors: z.object({ enabled: z.boolean().optional(), origin: z.string().optional(), credentials: z.boolean().optional() }).optional(),
    helmet: z.object({ enabled: z.boolean().optional(), content_security_policy: z.boolean().optional() }).optional(),
  })
  .passthrough();

type YamlConfig = z.infer<typeof YamlConfigSchema>;

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  /** Candidate YAML files, first existing one wins. */
  yamlPaths?: string[];
  platform?: NodeJS.Platform;
  homeDir?: string;
}

function toInt(name: string, value: string | number | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Configuration Manager - YAML config file, node credentials from divi.conf,
 * environment variable overrides
 */
export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly config: GatewayConfig;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly sources: ConfigSources = {}) {
    this.env = sources.env ?? process.env;
    this.config = this.loadConfig();
    this.validateConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): GatewayConfig {
    const env = this.env;
    const yamlConfig = this.loadYamlConfig();
    const confPath =
      env.DIVI_CONF ||
      yamlConfig.rpc?.conf_path ||
      defaultNodeConfPath(this.sources.platform, env, this.sources.homeDir);
    const node: NodeCredentials = readNodeConf(confPath) ?? {};

    // divi.conf wins for credentials, then environment, then YAML
    return {
      server: {
        port: toInt('PORT', env.PORT || yamlConfig.server?.port, DEFAULT_VALUES.PORT),
        host: env.HOST || yamlConfig.server?.host || DEFAULT_VALUES.HOST,
        environment: env.NODE_ENV || yamlConfig.server?.environment || 'development',
        logLevel: env.LOG_LEVEL || yamlConfig.server?.log_level || DEFAULT_VALUES.LOG_LEVEL,
      },
      rpc: {
        user: node.rpcUser || env.RPC_USER || yamlConfig.rpc?.user || '',
        password: node.rpcPassword || env.RPC_PASS || yamlConfig.rpc?.password || '',
        host: env.RPC_HOST || yamlConfig.rpc?.host || DEFAULT_VALUES.RPC_HOST,
        port: node.rpcPort ?? toInt('RPC_PORT', env.RPC_PORT || yamlConfig.rpc?.port, DEFAULT_VALUES.RPC_PORT),
        timeout: toInt('RPC_TIMEOUT', env.RPC_TIMEOUT || yamlConfig.rpc?.timeout, DEFAULT_VALUES.RPC_TIMEOUT),
        confPath: fs.existsSync(confPath) ? confPath : undefined,
      },
      cache: {
        peerTtlMs: toInt('PEER_CACHE_TTL_MS', env.PEER_CACHE_TTL_MS || yamlConfig.cache?.peer_ttl_ms, DEFAULT_VALUES.PEER_CACHE_TTL_MS),
      },
      peers: {
        minVersion: env.PEER_MIN_VERSION || yamlConfig.peers?.min_version || DEFAULT_VALUES.PEER_MIN_VERSION,
        heightWindow: toInt(
          'PEER_HEIGHT_WINDOW',
          env.PEER_HEIGHT_WINDOW || yamlConfig.peers?.height_window,
          DEFAULT_VALUES.PEER_HEIGHT_WINDOW
        ),
      },
      cors: {
        enabled: env.CORS_ENABLED !== 'false' && yamlConfig.cors?.enabled !== false,
        origin: env.CORS_ORIGIN || yamlConfig.cors?.origin || '*',
        credentials: env.CORS_CREDENTIALS === 'true' || yamlConfig.cors?.credentials === true,
      },
      helmet: {
        enabled: env.HELMET_ENABLED !== 'false' && yamlConfig.helmet?.enabled !== false,
        contentSecurityPolicy: env.HELMET_CSP === 'true' || yamlConfig.helmet?.content_security_policy === true,
      },
    };
  }

  private loadYamlConfig(): YamlConfig {
    const configPaths = this.sources.yamlPaths ?? [
      path.join(process.cwd(), 'config.yaml'),
      path.join(process.cwd(), 'config.yml'),
    ];

    for (const configPath of configPaths) {
      if (!fs.existsSync(configPath)) continue;

      const fileContents = fs.readFileSync(configPath, 'utf8');
      const parsed = YamlConfigSchema.safeParse(yaml.load(fileContents) ?? {});
      if (!parsed.success) {
        throw new ConfigError(`Invalid configuration in ${configPath}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      }
      return parsed.data;
    }

    return {};
  }

  private validateConfig(): void {
    if (!this.config.rpc.user || !this.config.rpc.password) {
      throw new ConfigError('Missing rpcuser or rpcpassword in configuration file or environment variables.');
    }
    if (this.config.rpc.timeout === 0) {
      throw new ConfigError('RPC_TIMEOUT must be greater than zero');
    }
  }

  getConfig(): GatewayConfig {
    return this.config;
  }
}

export { DEFAULT_VALUES } from './constants';
