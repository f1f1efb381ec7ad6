export * from './artifacts';
export * from './cli';
export * from './commands';
export * from './deploy-plan';
export * from './process-runner';
export * from './scaffold';
