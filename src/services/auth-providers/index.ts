export * from './continuation-bridge';
export * from './email.provider';
export * from './guest.provider';
export * from './native.provider';
export * from './oauth.provider';
export type { ProviderOutcome } from './types';
