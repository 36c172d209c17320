/**
 * Translators
 *
 * Exports all translator implementations for different target platforms.
 */

// Export base types
export * from './types';

// Export Drizzle translator
export * from './drizzle';
