/**
 * Main types export file for the network status monitor
 */

// Configuration types
export * from './config';

// Result types
export * from './results';

// Alert types
export * from './alerts';

// Dashboard types
export * from './dashboard';

// Common utility types
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
