export * from './ErrorContext';
export * from './MigrateError';
export * from './errors';
export * from './errorFactory';
