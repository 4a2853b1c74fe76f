export * from './cluster-client';
export * from './trigger';
