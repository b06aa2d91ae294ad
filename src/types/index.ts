/**
 * Web API data types.
 */

export * from './common';
export * from './channel';
export * from './message';
export * from './user';
