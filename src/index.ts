// src/index.ts

export * from './core/errors';
export * from './core/saga';
export { Logger, LogLevel } from './core/logging/Logger';
export * from './infrastructure/platform/types';
export { PlatformClient, countProcesses } from './infrastructure/platform/PlatformClient';
export * from './infrastructure/transfer/types';
export { TransferClient } from './infrastructure/transfer/TransferClient';
export { pollTransfer, isTerminal } from './infrastructure/transfer/pollTransfer';
export * from './migration';
export { migrateCommand } from './interface/cli/migrate';
