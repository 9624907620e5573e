export * from './api/client.js';
export * from './api/errors.js';
export * from './api/params.js';
export * from './api/types.js';

export * from './output/format.js';
export * from './output/mode.js';
export * from './output/output.js';

export * from './args.js';
export * from './config.js';
export * from './credentials.js';
export * from './logger.js';
export * from './setup.js';

export { runCli, GROUPS, VERSION, type CliDeps, type CliIo } from './cli.js';
