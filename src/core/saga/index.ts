export * from './types';
export * from './ForwardRegistry';
export * from './CompensationStack';
export * from './RetryPolicy';
export * from './CancellationGuard';
export * from './SagaExecutor';
