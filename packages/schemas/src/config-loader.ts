import { readFile } from 'node:fs/promises';
import type { QuotaOperation } from '@searchgate/shared/src/types/wallet.types.js';
import { ConfigurationError, SchemaValidationError } from '@searchgate/shared/src/utils/errors.js';
import { validateIndexSeed, validateRuntimeEnv } from './validators.js';
import type { IndexEntry } from './index-entry.schema.js';
import type { RuntimeEnv } from './runtime-config.schema.js';

export interface RuntimeConfig {
  readonly port: number;
  readonly sessionSecret: string;
  /** Firestore-backed collaborators are used when set, in-memory ones otherwise. */
  readonly projectId?: string;
  readonly mockSearch: boolean;
  readonly indexFile?: string;
  readonly creditCosts: Readonly<Record<QuotaOperation, number>>;
  readonly freeDailySearches: number;
}

function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

function parseEnv(env: NodeJS.ProcessEnv): RuntimeEnv {
  try {
    return validateRuntimeEnv(withoutEmptyValues(env));
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw new ConfigurationError(`${error.message}: ${error.validationErrors.join('; ')}`);
    }
    throw error;
  }
}

/**
 * Reads the server configuration from environment variables. The provider
 * API key is deliberately absent: the web-search client reads it per call.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = parseEnv(env);

  return {
    port: parsed.PORT,
    sessionSecret: parsed.SEARCHGATE_SESSION_SECRET,
    projectId: parsed.SEARCHGATE_GCP_PROJECT_ID,
    mockSearch: parsed.SEARCHGATE_MOCK_SEARCH,
    indexFile: parsed.SEARCHGATE_INDEX_FILE,
    creditCosts: { web_search: parsed.CREDIT_COST_WEB_SEARCH },
    freeDailySearches: parsed.FREE_DAILY_SEARCHES,
  };
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadIndexSeed(filePath: string): Promise<readonly IndexEntry[]> {
  const raw = await readJsonFile(filePath);
  return validateIndexSeed(raw).entries;
}
