import { cosmiconfig } from 'cosmiconfig';
import { crabConfigSchema, defaultConfig, type CrabConfigOutput } from '../schemas/config.schema.js';
import { APP_NAME } from '../constants.js';
import { ConfigError } from '../errors.js';

export const CONFIG_SEARCH_PLACES = [
  '.crabrc',
  '.crabrc.json',
  '.crabrc.yaml',
  '.crabrc.yml',
  'crab.config.json',
];

let cachedConfig: CrabConfigOutput | null = null;
let cachedCrabDir: string | null = null;

/**
 * Load the optional config file from the crab directory. A missing file
 * yields the defaults; an unreadable or invalid one is a ConfigError.
 */
export const loadConfig = async (crabDir: string): Promise<CrabConfigOutput> => {
  if (cachedConfig && cachedCrabDir === crabDir) {
    return cachedConfig;
  }

  const explorer = cosmiconfig(APP_NAME, {
    searchPlaces: CONFIG_SEARCH_PLACES,
    searchStrategy: 'none',
  });

  let found: { config: unknown; filepath: string; isEmpty?: boolean } | null;
  try {
    found = await explorer.search(crabDir);
  } catch (error) {
    throw new ConfigError(
      `Failed to read configuration: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!found || found.isEmpty) {
    cachedConfig = defaultConfig;
    cachedCrabDir = crabDir;
    return cachedConfig;
  }

  const result = crabConfigSchema.safeParse(found.config);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${found.filepath}: ${result.error.message}`);
  }

  cachedConfig = result.data;
  cachedCrabDir = crabDir;
  return cachedConfig;
};

export const clearConfigCache = (): void => {
  cachedConfig = null;
  cachedCrabDir = null;
};
