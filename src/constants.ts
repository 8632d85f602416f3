/**
 * Format tag written into the JSON representation of a notebook
 */
export const JSON_FORMAT = 'SOURCE';

/**
 * Command name, also the prefix of every debug namespace
 */
export const CLI_NAME = 'nbsource';

/**
 * Prefix for environment variables read by the CLI
 */
export const ENV_PREFIX = 'NBSOURCE_';

/**
 * Reported by `nbsource --version`; kept in step with package.json
 */
export const VERSION = '0.1.0';
