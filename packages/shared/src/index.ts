export * from './aws';
export * from './errors';
export * from './logger';
