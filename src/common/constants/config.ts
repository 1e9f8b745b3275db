/**
 * Centralized configuration constants for the application
 */

// RPC probing
export const RPC = {
  // JSON-RPC protocol version sent with every request
  JSONRPC_VERSION: '2.0',

  PROBE: {
    // Overall budget for one probe, connection setup included
    DEADLINE_MS: 30_000,

    // Budget for establishing the connection (TCP + TLS) within the overall deadline
    CONNECT_TIMEOUT_MS: 10_000,
  },

  POOL: {
    // Idle keep-alive sockets kept per host
    MAX_IDLE_SOCKETS: 100,

    // Idle sockets are released after this long
    IDLE_TIMEOUT_MS: 90_000,
  },
};

// Exposed metric series
export const METRICS = {
  RPC_HEALTHY: {
    NAME: 'blockchain_rpc_healthy',
    HELP: 'Indicates if the blockchain RPC endpoint is healthy (1 for healthy, 0 for unhealthy).',
  },
  BLOCK_NUMBER: {
    NAME: 'blockchain_block_number',
    HELP: 'The current block number of the blockchain.',
  },
  ENDPOINT_LABEL: 'endpoint',
} as const;

// Scheduler job names
export const SCHEDULER = {
  RPC_HEALTH_CHECK: 'rpc-health-check',
} as const;

// Environment variable names
export const ENV_VARS = {
  NODE_ENV: 'NODE_ENV',
  CONFIG_FILE: 'CONFIG_FILE',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_DIR: 'LOG_DIR',
  ENABLE_DEFAULT_METRICS: 'ENABLE_DEFAULT_METRICS',
} as const;

// Default values
export const DEFAULTS = {
  CONFIG_FILE: 'config.yaml',
  LOG_LEVEL: 'info',
  NODE_ENV: 'production',
  ENABLE_DEFAULT_METRICS: true,
} as const;

export const USAGE = `Blockchain RPC Checker
Usage: blockchain-rpc-checker [options]

Options:
  --help, -h          Display this help message
  --config <path>     Path to configuration file (default "${DEFAULTS.CONFIG_FILE}")

Description:
  This tool checks the health of blockchain RPC endpoints and exposes metrics for Prometheus.
  It reads configuration from a YAML file and periodically checks the specified endpoints.

Configuration File Format:
  endpoints:
    - name: endpoint1
      url: http://example1.com
    - name: endpoint2
      url: http://example2.com
  interval: 5  # Check interval in minutes
  method: eth_blockNumber  # RPC method to call
  prometheus:
    address: :8080  # Address to expose Prometheus metrics
`;
