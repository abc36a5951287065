export * from './plannerConfig';
