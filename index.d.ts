// Type definitions for tsd testing
// Re-export types from source files
export * from './src/index';
