/**
 * Weather Forecast Client — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';

// Errors
export * from './errors';

// Wire codecs
export * from './codec';

// Query encoding
export * from './query';

// Request builders
export * from './request';

// Client + transport
export * from './client';

// Response decoding
export * from './response';

// Configuration
export * from './config';
