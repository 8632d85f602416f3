export * from './types';
export { JSON_FORMAT } from './constants';
export * from './errors';
export { detectLanguage, wrapMagic, unwrapMagic } from './magic';
export { parseNotebook, serializeNotebook } from './parser';
export { toJSON, fromJSON, parseNotebookJson } from './jsonCodec';
export { getCell, updateCell, insertCell, deleteCell } from './operations';
export {
  cellsToIpynb,
  ipynbToCells,
  sourceToIpynb,
  ipynbToSource,
} from './ipynbConverter';
export type { IpynbCell, IpynbNotebook } from './ipynbConverter';
export * from './cellMatcher';
export { createProgram, registerCommands } from './commands';
export type { CliIO } from './commands';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { CliConfig } from './config';
