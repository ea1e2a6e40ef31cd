/**
 * Pattern library: immutable rule tables for recognition and extraction.
 */

export * from './document-types';
export * from './document-patterns';
export * from './entity-patterns';
export * from './legal-knowledge';
