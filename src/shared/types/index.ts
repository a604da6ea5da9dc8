/**
 * ============================================================================
 * TYPES PARTAGÉS - INDEX
 * ============================================================================
 *
 * Ce fichier centralise l'export de tous les types partagés.
 * Cela permet un import propre : import { Finding, ContentTree } from '../shared/types';
 *
 * @version 1.0.0
 */

export * from './docx.types';
export * from './report.types';
