export * from './auth';
export * from './json';
