export { Dispatcher, dispatcher_assemble } from './Dispatcher.js';
export type { DispatcherConfig, DispatcherServiceBag } from './Dispatcher.js';
export { argv_parse, line_parse, USAGE } from './argv.js';
export type { ArgvParseResult } from './argv.js';
export { DispatchRequestSchema } from './schemas.js';
export type { DispatchRequest } from './schemas.js';
export { Presenter, MARKERS } from './Presenter.js';
export type { DispatchResponse, DispatchData } from './types.js';
