export * from './version-spec';
