// Server configuration, read once at startup and threaded into every handler

// External packages
import { z } from 'zod';

// Local modules
import { ConfigError } from './errors.js';
import { LogLevel, parseLogLevel } from './logger.js';

export const CREDENTIAL_NAMES = ['OPENAI_API_KEY', 'TAVILY_API_KEY', 'GITHUB_TOKEN'] as const;

export type CredentialName = typeof CREDENTIAL_NAMES[number];

export interface ServerConfig {
  server: {
    name: string;
    version: string;
  };
  logLevel: LogLevel;
  dispatch: {
    // Undefined disables the default timeout
    timeoutMs?: number;
  };
  research: {
    cliPath: string;
    timeoutMs: number;
    retriever: string;
    docPath?: string;
  };
  credentials: Partial<Record<CredentialName, string>>;
}

// Largest delay setTimeout honours; longer delays fire after 1ms
export const MAX_TIMER_MS = 2_147_483_647;

const optionalText = z.string().trim().optional().transform((value) => value || undefined);

const EnvSchema = z.object({
  SERVER_NAME: optionalText,
  LOG_LEVEL: optionalText.refine(
    (value) => value === undefined || parseLogLevel(value) !== undefined,
    { message: 'must be one of ERROR, WARN, INFO, DEBUG' }
  ),
  HANDLER_TIMEOUT_MS: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(0),
  RESEARCH_CLI_PATH: optionalText,
  RESEARCH_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(600_000),
  RESEARCH_RETRIEVER: optionalText,
  DOC_PATH: optionalText,
  OPENAI_API_KEY: optionalText,
  TAVILY_API_KEY: optionalText,
  GITHUB_TOKEN: optionalText
});

export const DEFAULT_SERVER_NAME = 'Research Capability Server';
export const SERVER_VERSION = '1.0.0';

// --research-cli-path takes precedence over RESEARCH_CLI_PATH
export function readCliPathArgument(argv: readonly string[]): string | undefined {
  const index = argv.indexOf('--research-cli-path');
  if (index !== -1 && index + 1 < argv.length) {
    return argv[index + 1];
  }
  return undefined;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  argv: readonly string[] = process.argv
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const values = parsed.data;

  const credentials: Partial<Record<CredentialName, string>> = {};
  for (const name of CREDENTIAL_NAMES) {
    const value = values[name];
    if (value !== undefined) {
      credentials[name] = value;
    }
  }

  return {
    server: {
      name: values.SERVER_NAME ?? DEFAULT_SERVER_NAME,
      version: SERVER_VERSION
    },
    logLevel: values.LOG_LEVEL === undefined ? LogLevel.INFO : parseLogLevel(values.LOG_LEVEL) ?? LogLevel.INFO,
    dispatch: {
      timeoutMs: values.HANDLER_TIMEOUT_MS > 0 ? values.HANDLER_TIMEOUT_MS : undefined
    },
    research: {
      cliPath: readCliPathArgument(argv) ?? values.RESEARCH_CLI_PATH ?? 'claude',
      timeoutMs: values.RESEARCH_TIMEOUT_MS,
      retriever: values.RESEARCH_RETRIEVER ?? 'tavily',
      docPath: values.DOC_PATH
    },
    credentials
  };
}
