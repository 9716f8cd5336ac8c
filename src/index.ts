export * from './types';
export * from './config';
export * from './models';
export * from './services';
export * from './upload';
export {Logger, LogLevel, CategoryLogger, buildPrefix, buildUploadUrl} from './utils';
