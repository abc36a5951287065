/**
 * @uld-planner/utils - Parser Module
 * 
 * ULD input validation and batch CSV parsing.
 */

export * from './uldInputParser';
