/**
 * Adapters
 *
 * Exports all adapter implementations for different database systems.
 */

// Export base types
export * from './types';

// Export Drizzle adapter
export * from './drizzle';
