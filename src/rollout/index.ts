export * from './health';
export * from './plan';
export * from './state-machine';
export * from './strategies';
