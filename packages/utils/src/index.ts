/**
 * @uld-planner/utils
 * 
 * ULD load planning engines and utilities.
 * This package provides the core algorithms for cargo deck placement:
 * - Aircraft and ULD-type catalog loading
 * - ULD input validation and CSV parsing
 * - Slot model construction and moment arms
 * - Greedy slot assignment (first-fit or CG-balanced)
 * - Weight and moment accumulation
 * - Assignment reports and bay diagrams
 */

// Types - pure type definitions only
export * from './types';

// Catalog - reference data loading
export * from './catalog';

// Parser - ULD input validation
export * from './parser';

// Solver - slot model, placement and balance
export * from './solver';

// Export - reports, diagrams, plan files
export * from './export';

// Config - environment-driven settings
export * from './config';
