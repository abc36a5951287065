/**
 * @uld-planner/utils - Type Definitions
 * 
 * Core data models for slot-based ULD load planning.
 */

export * from './loadTypes';
