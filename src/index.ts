export * from './errors';
export * from './sanitize';
export * from './files';
export * from './readers';
export * from './db';
export * from './loader';
export * from './config';
export { main, runLoad } from './cli/main';
