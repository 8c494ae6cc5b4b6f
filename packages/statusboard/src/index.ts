export * from './schema';
export * from './errors';
export * from './variables';
export * from './executor';
export * from './store';
export * from './scheduler';
export * from './render';
export * from './defaults';
