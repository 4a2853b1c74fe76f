export * from './state-machine';
export * from './stage-runner';
export * from './stage-actions';
export * from './executor';
