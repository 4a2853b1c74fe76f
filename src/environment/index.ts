export * from './runtime';
export * from './provisioner';
export * from './docker-runtime';
