export * from './catalog';
export * from './cli';
export * from './download';
export * from './fetch';
export * from './process';
export * from './ui';
