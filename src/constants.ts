export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const OPENML_BASE_URL = 'https://www.openml.org';
export const OPENML_API_PATH = '/api/v1/json';
export const OPENML_DATA_PATH = '/data/v1';
export const OPENML_CLASSIFICATION_TASK_TYPE = 1;
export const OPENML_REGRESSION_TASK_TYPE = 2;
// seed used when an OpenML source is asked to take a subset of its rows
export const OPENML_TAKE_SEED = 1;
export const MISSING_VALUE_TOKENS: readonly string[] = ['?', ''];

// linear congruential generator parameters (L'Ecuyer, 1999)
export const LCG_MODULUS = 2 ** 30;
export const LCG_MULTIPLIER = 116646453;
export const LCG_INCREMENT = 9;

export const DEFAULT_SYNTHETIC_INTERACTIONS = 500;
export const DEFAULT_SYNTHETIC_ACTIONS = 10;
