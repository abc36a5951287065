/**
 * @uld-planner/utils - Catalog Module
 * 
 * Aircraft and ULD-type reference catalogs.
 */

export * from './catalogLoader';
