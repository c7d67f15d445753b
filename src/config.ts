import { DEFAULT_REQUEST_TIMEOUT_MS } from './constants';

export interface IEnvironmentsConfig {
  openmlApiKey?: string;
  // datasets fetched from remote repositories are also written here when set
  cacheDirectory?: string;
  requestTimeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IEnvironmentsConfig {
  const timeout = Number(env.ENVIRONMENTS_REQUEST_TIMEOUT_MS);
  return {
    openmlApiKey: env.OPENML_API_KEY || undefined,
    cacheDirectory: env.ENVIRONMENTS_CACHE_DIR || undefined,
    requestTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_REQUEST_TIMEOUT_MS,
  };
}
