export * from './fs-interface';
export * from './http-interface';
export * from './process-interface';
export * from './progress-interface';
export * from './archive-interface';
