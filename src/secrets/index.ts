export * from './secret-store';
export * from './resolver';
