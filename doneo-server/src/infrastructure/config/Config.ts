import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigError } from '../../domain/common/Errors';
import { LogLevel } from '../../domain/common/ILogger';

export interface CorsConfig {
  enabled: boolean;
  origins: string[];
  credentials?: boolean;
}

export interface LogConfig {
  level: LogLevel;
  format: 'json' | 'pretty';
}

export interface ConfigOptions {
  port: number;
  host: string;
  /** Root of the project files and the audit trail. */
  dataDir: string;
  /** Largest decoded image accepted in a message or attachment. */
  maxImageBytes: number;
  cors: CorsConfig;
  log: LogConfig;
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
const LOG_FORMATS = ['json', 'pretty'] as const;
const NODE_ENVS = ['development', 'production', 'test'] as const;

const PORT_RULE = 'PORT must be between 0 and 65535';
const MAX_IMAGE_RULE = 'MAX_IMAGE_BYTES must be a positive integer';

// An exported but empty variable counts as unset
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

function mustBeOneOf(name: string, values: readonly string[]) {
  return { errorMap: () => ({ message: `${name} must be one of: ${values.join(', ')}` }) };
}

const envSchema = z.object({
  PORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number({ invalid_type_error: PORT_RULE }).int(PORT_RULE).min(0, PORT_RULE).max(65535, PORT_RULE).default(3000)
  ),
  HOST: z.preprocess(blankAsUndefined, z.string().default('0.0.0.0')),
  DATA_DIR: z.preprocess(blankAsUndefined, z.string().default('~/.doneo/data')),
  MAX_IMAGE_BYTES: z.preprocess(
    blankAsUndefined,
    z.coerce.number({ invalid_type_error: MAX_IMAGE_RULE }).int(MAX_IMAGE_RULE).min(1, MAX_IMAGE_RULE).default(10 * 1024 * 1024)
  ),
  CORS_ENABLED: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),
  CORS_CREDENTIALS: z.string().optional(),
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS, mustBeOneOf('LOG_LEVEL', LOG_LEVELS)).default('info')),
  LOG_FORMAT: z.preprocess(blankAsUndefined, z.enum(LOG_FORMATS, mustBeOneOf('LOG_FORMAT', LOG_FORMATS)).default('pretty')),
  NODE_ENV: z.preprocess(blankAsUndefined, z.enum(NODE_ENVS, mustBeOneOf('NODE_ENV', NODE_ENVS)).default('development')),
});

function expandHome(p: string): string {
  return p.startsWith('~') ? path.join(os.homedir(), p.slice(1)) : p;
}

/**
 * Server settings read once from environment variables.
 *
 * | Variable         | Default           |
 * |------------------|-------------------|
 * | PORT             | 3000              |
 * | HOST             | 0.0.0.0           |
 * | DATA_DIR         | ~/.doneo/data     |
 * | MAX_IMAGE_BYTES  | 10485760          |
 * | CORS_ENABLED     | true              |
 * | CORS_ORIGINS     | *                 |
 * | CORS_CREDENTIALS | false             |
 * | LOG_LEVEL        | info              |
 * | LOG_FORMAT       | pretty            |
 * | NODE_ENV         | development       |
 */
export class Config implements Readonly<ConfigOptions> {
  private readonly config: ConfigOptions;

  /**
   * @throws {ConfigError} naming the first offending variable
   */
  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.config = Config.parse(env);
    this.validate();
  }

  private static parse(env: NodeJS.ProcessEnv): ConfigOptions {
    const result = envSchema.safeParse(env);
    if (!result.success) {
      throw new ConfigError(result.error.issues[0]?.message ?? 'Invalid configuration');
    }
    const vars = result.data;

    return {
      port: vars.PORT,
      host: vars.HOST,
      dataDir: expandHome(vars.DATA_DIR),
      maxImageBytes: vars.MAX_IMAGE_BYTES,
      cors: {
        enabled: vars.CORS_ENABLED !== 'false',
        origins: vars.CORS_ORIGINS?.split(',').map(s => s.trim()).filter(Boolean) || ['*'],
        credentials: vars.CORS_CREDENTIALS === 'true'
      },
      log: { level: vars.LOG_LEVEL, format: vars.LOG_FORMAT },
      nodeEnv: vars.NODE_ENV
    };
  }

  /**
   * Re-check values that may have been overridden after parsing.
   * @throws {ConfigError}
   */
  validate(): void {
    const { port, maxImageBytes, dataDir } = this.config;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(PORT_RULE);
    }
    if (!Number.isInteger(maxImageBytes) || maxImageBytes <= 0) {
      throw new ConfigError(MAX_IMAGE_RULE);
    }
    if (!dataDir) {
      throw new ConfigError('DATA_DIR cannot be empty');
    }
  }

  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get dataDir(): string { return this.config.dataDir; }
  get maxImageBytes(): number { return this.config.maxImageBytes; }
  get cors(): CorsConfig { return this.config.cors; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): ConfigOptions['nodeEnv'] { return this.config.nodeEnv; }

  /**
   * Defaults (or the given env) with explicit overrides on top. Used by tests.
   */
  static fromObject(overrides: Partial<ConfigOptions>, env: NodeJS.ProcessEnv = {}): Config {
    const config = new Config(env);
    Object.assign(config.config, overrides);
    config.validate();
    return config;
  }

  toJSON(): ConfigOptions {
    return { ...this.config };
  }

  toString(): string {
    return [
      'Config:',
      `  listen: ${this.host}:${this.port}`,
      `  dataDir: ${this.dataDir}`,
      `  maxImageBytes: ${this.maxImageBytes}`,
      `  log: ${this.log.level}/${this.log.format}`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
