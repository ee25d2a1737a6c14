/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer contains the technology-agnostic contracts and values.
 * NO infrastructure dependencies are allowed here (Hexagonal Architecture).
 *
 * @module @correlate-js/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Context - Correlation context value, accessor and factory contracts
// ============================================================================
export * from './context';

// ============================================================================
// Correlation - Manager ports, id generation, failure handling
// ============================================================================
export * from './correlation';

// ============================================================================
// Logging - Log scope port
// ============================================================================
export * from './logging';

// ============================================================================
// Errors
// ============================================================================
export * from './errors';
