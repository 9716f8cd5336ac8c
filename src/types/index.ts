export * from './upload.types';
export * from './settings.types';
