/**
 * Pluggable retry handlers for HTTP requests.
 */

export * from './state';
export * from './jitter';
export * from './interval-calculator';
export * from './handler';
export * from './builtin-handlers';
export * from './executor';
