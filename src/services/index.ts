export * from './file-service-client';
