/**
 * Configuration type definitions
 * Timeouts, TLS behaviour and transport settings for each collaborator
 */

// Storage array management endpoint
export interface ArrayConfig {
  apiVersion: string;
  // Self-signed management certificates are only accepted when set
  allowUntrustedCertificate: boolean;
  requestTimeoutMs: number;
}

export type SqlAuthenticationType = 'sql' | 'ntlm';

// Database engine connections
export interface DatabaseConfig {
  encrypt: boolean;
  trustServerCertificate: boolean;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  authentication: SqlAuthenticationType;
}

export type RemoteAuthentication = 'Default' | 'Kerberos' | 'Negotiate' | 'CredSSP';

// PowerShell remoting to the database hosts
export interface RemoteConfig {
  shell: string;
  useSsl: boolean;
  port: number; // 0 = WinRM default
  authentication: RemoteAuthentication;
}

export interface OrchestrationConfig {
  stepTimeoutMs: number;      // every suspension point; 0 = unbounded
  overwriteTimeoutMs: number; // the volume overwrite; 0 = unbounded
}

export interface HistoryConfig {
  enabled: boolean;
  listLimit: number;
}

// Main configuration interface
export interface VolumeRefreshConfig {
  version: string;
  array: ArrayConfig;
  database: DatabaseConfig;
  remote: RemoteConfig;
  orchestration: OrchestrationConfig;
  history: HistoryConfig;
}
