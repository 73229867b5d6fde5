export * from './loader';
export * from './order';
export * from './target';
export * from './transforms';
