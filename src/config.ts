import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  ollama: {
    apiUrl: string;
    model: string;
  };
  weather: {
    apiKey?: string;
    baseUrl: string;
  };
  holidays: {
    calendarUrl: string;
  };
  chat: {
    turnTimeoutMs: number;
    titleTimeoutMs: number;
    titleSafetyMarginMs: number;
    maxToolRounds: number;
    titleCacheSize: number;
    titlePromptVersion: string;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    requestTimeoutMs: number;
  };
  webApi: {
    enabled: boolean;
    port: number;
  };
  database: {
    file: string;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  ollama: z.object({
    apiUrl: z.string().url('Invalid Ollama URL format'),
    model: z.string().min(1, 'A model name is required'),
  }),
  weather: z.object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url('Invalid weather API URL format'),
  }),
  holidays: z.object({
    calendarUrl: z.string().url('Invalid holiday calendar URL format'),
  }),
  chat: z.object({
    turnTimeoutMs: z.number().int().min(1000).max(300000),
    titleTimeoutMs: z.number().int().min(500).max(300000),
    titleSafetyMarginMs: z.number().int().min(0).max(10000),
    maxToolRounds: z.number().int().min(1).max(50),
    titleCacheSize: z.number().int().min(1),
    titlePromptVersion: z.string().min(1),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(0).max(10000),
    maxDelayMs: z.number().int().min(0).max(60000),
    requestTimeoutMs: z.number().int().min(1000).max(300000),
  }),
  webApi: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1024).max(65535),
  }),
  database: z.object({
    file: z.string().min(1),
  }),
});

export const DEFAULT_HOLIDAY_CALENDAR_URL = 'https://www.officeholidays.com/ics/spain/catalonia';

/**
 * Parse command line arguments
 * Usage: node dist/index.js --ollama-url http://localhost:11434 --model llama3.1 --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = argv[i + 1];

      // Next arg is either this flag's value or another flag
      if (next !== undefined && !next.startsWith('--')) {
        args[key] = next;
        i++;
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments and environment variables.
 * CLI arguments win over the environment; throws a ZodError when invalid.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig: Config = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'conversation-assistant'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    ollama: {
      apiUrl: getString('ollama-url', 'OLLAMA_API_URL', 'http://localhost:11434'),
      model: getString('model', 'OLLAMA_MODEL', 'llama3.1'),
    },
    weather: {
      apiKey: getOptionalString('weather-api-key', 'WEATHER_API_KEY'),
      baseUrl: getString('weather-url', 'WEATHER_API_URL', 'https://api.weatherapi.com/v1'),
    },
    holidays: {
      calendarUrl: getString('holiday-calendar', 'HOLIDAY_CALENDAR_LINK', DEFAULT_HOLIDAY_CALENDAR_URL),
    },
    chat: {
      turnTimeoutMs: getNumber('turn-timeout', 'TURN_TIMEOUT_MS', 30000),
      titleTimeoutMs: getNumber('title-timeout', 'TITLE_TIMEOUT_MS', 15000),
      titleSafetyMarginMs: getNumber('title-safety-margin', 'TITLE_SAFETY_MARGIN_MS', 500),
      maxToolRounds: getNumber('max-tool-rounds', 'MAX_TOOL_ROUNDS', 15),
      titleCacheSize: getNumber('title-cache-size', 'TITLE_CACHE_SIZE', 10000),
      titlePromptVersion: getString('title-prompt-version', 'TITLE_PROMPT_VERSION', 'v1'),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 500),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 4000),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 30000),
    },
    webApi: {
      enabled: getBoolean('web-api', 'WEB_API_ENABLED', true),
      port: getNumber('port', 'PORT', 3001),
    },
    database: {
      file: getString('database', 'DATABASE_FILE', 'conversations.db'),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration or exit with the validation errors
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Ollama URL must be valid (e.g., http://localhost:11434)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('─'.repeat(68));
  console.error(`  ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error('─'.repeat(68));

  console.error(`\n🔗 Ollama: ${config.ollama.apiUrl} (model: ${config.ollama.model})`);
  console.error(`🌦  Weather: ${config.weather.apiKey ? 'configured' : 'not configured (set WEATHER_API_KEY)'}`);
  console.error(`📅 Holidays: ${config.holidays.calendarUrl}`);
  console.error(
    `⏱  Turn deadline: ${config.chat.turnTimeoutMs}ms | Title budget: ${config.chat.titleTimeoutMs}ms | Tool rounds: ${config.chat.maxToolRounds}`
  );
  console.error(
    `🔁 Retry: ${config.retry.maxAttempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms)`
  );
  console.error(`🗂  Title cache: ${config.chat.titleCacheSize} entries (prompt ${config.chat.titlePromptVersion})`);

  if (config.webApi.enabled) {
    console.error(`\n🌐 HTTP API: http://localhost:${config.webApi.port}`);
  }

  console.error('\n' + '─'.repeat(68));
}
