/**
 * Code Ocean client constants: API paths, credentials, polling tunables
 */

/**
 * API prefix appended to the deployment domain
 */
export const CODEOCEAN_API_PATH = "/api/v1";

export const CODEOCEAN_COMPUTATIONS_PATH = "/computations";

export const CODEOCEAN_DATA_ASSETS_PATH = "/data_assets";

/**
 * Environment variables holding the client credentials
 */
export const CODEOCEAN_DOMAIN_ENV = "CODEOCEAN_DOMAIN";
export const CODEOCEAN_API_TOKEN_ENV = "CODEOCEAN_API_TOKEN";

/**
 * Interval between status polls while waiting for a computation or asset
 */
export const CODEOCEAN_DEFAULT_POLL_INTERVAL_MS = 5_000;

/**
 * Wall-clock limit for a single wait call
 * Undefined: wait until the resource reaches a terminal state.
 */
export const CODEOCEAN_DEFAULT_WAIT_TIMEOUT_MS: number | undefined = undefined;
