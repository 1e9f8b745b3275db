// Configuration types
export * from './config/health-check';

// RPC types
export * from './rpc/endpoint';
export * from './rpc/probe';

// Monitoring types
export * from './monitoring/cycle';
