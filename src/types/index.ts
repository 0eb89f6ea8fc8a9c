/**
 * Consolidated types index - exports all type definitions
 */

// AI-related types
export * from './ai';

// Review-related types
export * from './review';

// Configuration types
export * from './config';

// Error classes
export * from './errors';
