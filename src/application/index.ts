/**
 * @module resilient-dispatch/application
 * @description Application layer exports
 */

// ============================================================================
// CQRS Contracts
// ============================================================================

export * from './cqrs';

// ============================================================================
// Configuration
// ============================================================================

export * from './config';

// ============================================================================
// Logging Port
// ============================================================================

export * from './logging';

// ============================================================================
// Metrics Port
// ============================================================================

export * from './metrics';
