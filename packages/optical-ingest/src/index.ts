export * from './types';
export * from './errors';
export * from './config';
export * from './logger';
export * from './session';
export * from './catalog';
export * from './throttle';
export * from './parser';
export * from './model';
export * from './pipeline';
export * from './views';
