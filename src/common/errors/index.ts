export * from './error-kinds';
export * from './domain-error';
