import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../../domain/common/Errors';
import { LogLevel } from '../../domain/common/ILogger';

export type StoreType = 'filesystem' | 'memory';

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Storage
  dataDir: string;
  storeType: StoreType;

  // Per-collection sequence settings (YAML)
  sequenceConfigPath: string;

  // Operational
  logLevel: LogLevel;
}

const STORE_TYPES: readonly string[] = ['filesystem', 'memory'];
const LOG_LEVELS: readonly string[] = ['error', 'warn', 'info', 'debug'];
const NODE_ENVS: readonly string[] = ['development', 'production', 'test'];

function isStoreType(value: string): value is StoreType {
  return STORE_TYPES.includes(value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = Config.loadFromEnvironment(env);
  }

  private static loadFromEnvironment(env: NodeJS.ProcessEnv): ConfigOptions {
    const storeType = env.STORE_TYPE || 'filesystem';
    const nodeEnv = env.NODE_ENV || 'development';

    if (!isStoreType(storeType)) {
      throw new ConfigError('STORE_TYPE must be "filesystem" or "memory"');
    }
    if (!NODE_ENVS.includes(nodeEnv)) {
      throw new ConfigError('NODE_ENV must be "development", "production", or "test"');
    }
    // Test runs only report errors unless asked otherwise
    const logLevel = env.LOG_LEVEL || (nodeEnv === 'test' ? 'error' : 'info');
    if (!isLogLevel(logLevel)) {
      throw new ConfigError('LOG_LEVEL must be "error", "warn", "info", or "debug"');
    }

    return {
      dataDir: expandPath(env.DATA_DIR || '~/.sequencer/data'),
      storeType,
      sequenceConfigPath: expandPath(env.SEQUENCE_CONFIG || '~/.sequencer/sequences.yaml'),
      logLevel,
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    if (!this.config.dataDir) {
      throw new ConfigError('DATA_DIR must not be empty');
    }
    if (!this.config.sequenceConfigPath) {
      throw new ConfigError('SEQUENCE_CONFIG must not be empty');
    }
    if (!isStoreType(this.config.storeType)) {
      throw new ConfigError('STORE_TYPE must be "filesystem" or "memory"');
    }
    if (!isLogLevel(this.config.logLevel)) {
      throw new ConfigError('LOG_LEVEL must be "error", "warn", "info", or "debug"');
    }
  }

  // Readonly accessors
  get dataDir(): string { return this.config.dataDir; }
  get storeType(): StoreType { return this.config.storeType; }
  get sequenceConfigPath(): string { return this.config.sequenceConfigPath; }
  get logLevel(): LogLevel { return this.config.logLevel; }

  /**
   * Create a Config instance from an object (useful for testing).
   * Environment variables are ignored.
   */
  static fromObject(overrides: Partial<ConfigOptions>): Config {
    const config = new Config({});
    Object.assign(config.config, overrides);
    config.validate();
    return config;
  }
}
