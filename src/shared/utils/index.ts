export * from './auth-state';
export * from './dedup';
export * from './errors';
export * from './json';
export * from './storage';
export * from './user';
