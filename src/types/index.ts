/**
 * Type Definitions Index
 * Central export for all type definitions
 */

export * from './api';
export * from './models';
export * from './analytics';
export * from './notification';
