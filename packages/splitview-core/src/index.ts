/**
 * splitview core: config, logging, error handling and the directory model
 * behind the terminal viewer
 */

export * from './config';
export * from './content';
export * from './error-boundary';
export * from './file-tree';
export * from './logger';
export * from './utils';
