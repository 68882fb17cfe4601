/**
 * QueryGate - Storage Module
 *
 * Barrel export file for database connection sources
 */

export { PostgresClient, isStatementTimeout } from './postgres.js';
