export * from './constants';
export * from './defaults';
