export * from './upload-record';
