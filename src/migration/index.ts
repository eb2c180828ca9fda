export * from './types';
export * from './progress';
export * from './plan';
export * from './steps';
