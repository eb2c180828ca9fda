export * from './CheckSourceStep';
export * from './EnsureTransferServiceStep';
export * from './ProvisionStep';
export * from './MaintenanceStep';
export * from './ScaleZeroStep';
export * from './TransferStep';
export * from './RebindStep';
