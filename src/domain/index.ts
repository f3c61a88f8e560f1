/**
 * @module resilient-dispatch/domain
 * @description Domain layer exports
 */

// ============================================================================
// Result Type
// ============================================================================

export * from './result';

// ============================================================================
// Messages (Commands & Queries)
// ============================================================================

export * from './messages';

// ============================================================================
// Error Taxonomy
// ============================================================================

export * from './errors';

// ============================================================================
// Domain Events
// ============================================================================

export * from './events';

// ============================================================================
// Dispatch Scope
// ============================================================================

export * from './context';
