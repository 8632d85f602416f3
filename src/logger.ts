import debug, { Debugger } from 'debug';
import { CLI_NAME } from './constants';

export interface Logger {
  info: Debugger;
  debug: Debugger;
}

/**
 * Namespaced logger, enabled with DEBUG=nbsource:* (writes to stderr)
 */
export function getLogger(name: string): Logger {
  const d = debug(`${CLI_NAME}:${name}`);
  return { info: d, debug: d.extend('debug') };
}
