/**
 * @uld-planner/utils - Export Module
 * 
 * Assignment report, bay diagram and plan file output.
 */

export * from './assignmentReport';
export * from './deckDiagram';
export * from './loadPlanFile';
