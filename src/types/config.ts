/**
 * Configuration-related shared types
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
