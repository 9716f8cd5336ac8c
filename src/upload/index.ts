export * from './file-probe';
export * from './upload-attempt';
export * from './retry-strategy';
export * from './task-runner';
export * from './task-set';
export * from './upload-progress';
export * from './upload-manager';
