export * from './cli-options';
export * from './status-line';
export * from './main';
