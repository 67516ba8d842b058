export { PackageServer } from './PackageServer';
export type {
  PackageServerConfig,
  PackageServerDeps,
  UpgradeDecision,
  HealthStatus,
} from './PackageServer';
export { PackageConnection } from './PackageConnection';
export type { PackageConnectionOptions, PackageSocket, IncomingFrame } from './PackageConnection';
export { ConnectionManager } from './ConnectionManager';
export type { ManagedConnection } from './ConnectionManager';
export { FrameParser } from './FrameParser';
export type { FrameParserOptions } from './FrameParser';
export { userFromClaims, extractToken, createStaticTokenAuthenticator } from './auth';
export type { User, Authenticator, TokenClaims, StaticTokenAuthenticatorOptions } from './auth';
