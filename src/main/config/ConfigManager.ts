import {
  AppConfigSchema,
  ConfigEnvSchema,
  type AppConfig,
} from '@shared/schemas/validation';

/** Default size of the log file before electron-log rotates it */
const DEFAULT_LOG_MAX_SIZE = 10 * 1024 * 1024;

/**
 * Raised when the environment holds a value the engine cannot use
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Result of reading the environment
 *
 * `error` is set when the environment was rejected; `config` then holds the
 * defaults so the logger can still start and report the problem.
 */
export interface ConfigLoadResult {
  config: AppConfig;
  error?: ConfigurationError;
}

/**
 * Configuration Manager
 *
 * Reads the MAILNORM_* environment variables once, validates them with Zod
 * and caches the resolved configuration for the process.
 */
export class ConfigManager {
  private static cached: AppConfig | null = null;

  /**
   * Resolve configuration from an environment without caching it
   *
   * @param env - Environment variables (defaults to process.env)
   * @throws ConfigurationError if a variable is present but invalid
   */
  static resolve(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = ConfigEnvSchema.safeParse(env);

    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      );
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const values = parsed.data;
    const defaultLevel = values.NODE_ENV === 'development' ? 'debug' : 'info';

    return AppConfigSchema.parse({
      logLevel: values.MAILNORM_LOG_LEVEL ?? defaultLevel,
      logFile: values.MAILNORM_LOG_FILE,
      logMaxSize: values.MAILNORM_LOG_MAX_SIZE ?? DEFAULT_LOG_MAX_SIZE,
    });
  }

  /**
   * Load configuration, falling back to defaults when the environment is invalid
   */
  static load(env: NodeJS.ProcessEnv = process.env): ConfigLoadResult {
    try {
      return { config: this.resolve(env) };
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      return { config: this.defaults(env), error };
    }
  }

  /**
   * Cached configuration for this process
   *
   * @throws ConfigurationError if the environment is invalid
   */
  static get(): AppConfig {
    if (!this.cached) {
      this.cached = this.resolve();
    }
    return this.cached;
  }

  /**
   * Drop the cached configuration (tests change the environment between runs)
   */
  static reset(): void {
    this.cached = null;
  }

  private static defaults(env: NodeJS.ProcessEnv): AppConfig {
    return {
      logLevel: env.NODE_ENV === 'development' ? 'debug' : 'info',
      logMaxSize: DEFAULT_LOG_MAX_SIZE,
    };
  }
}

export default ConfigManager;
