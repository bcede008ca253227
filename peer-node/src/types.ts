export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface NodeConfig {
  port: number;
  host: string; // Address peers use to reach this node
  bindAddress: string; // Interface the HTTP server listens on
  nodeName: string;
  mediaDirectory: string; // <kind>/<gallery>/<file> tree shared with friends
  dataDirectory: string; // identity.json and friends/
  cacheDirectory: string; // Downloads, one subdirectory per peer
  watchMedia: boolean;
  requestTimeout: number; // milliseconds per outbound peer request
  onlineThreshold: number; // milliseconds a friend stays online after contact
  syncConcurrency: number;
  syncRetries: number;
  logLevel: LogLevel;
  logToFile?: boolean;
  logFilePath?: string;
  maxLogSize?: number; // Maximum log file size in bytes before rotation
  keepOldLogs?: number; // Number of old log files to keep
}
