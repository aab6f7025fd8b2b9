export { ContextLog, response_derive, RESPONSE_PREFIX } from './ContextLog.js';
export type { ContextLogView, ContextLogOptions, ResponseDeriver } from './types.js';
