export * from './chain';
export * from './flags';
export * from './ladder';
export * from './profile';
export * from './resolver';
export * from './table';
