export * from './registry-client';
export * from './publisher';
